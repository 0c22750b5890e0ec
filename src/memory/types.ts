export type Role = 'user' | 'agent';

/**
 * One entry of the conversation transcript.
 */
export interface Turn {
  /** Who produced the text. */
  role: Role;
  /** The text of the turn, as shown to the user. */
  content: string;
  /** When the turn was appended. */
  timestamp: Date;
}
