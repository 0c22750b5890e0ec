export type InvocationStatus = 'ok' | 'unknown-tool' | 'failed';

/**
 * What happened when the agent asked for a tool. Kept for display only.
 */
export interface ToolInvocationRecord {
    /** Name the agent asked for, registered or not */
    tool: string;
    input: string;
    /** Tool output, or the failure text the agent observed instead */
    output: string;
    status: InvocationStatus;
    timestamp: Date;
}
