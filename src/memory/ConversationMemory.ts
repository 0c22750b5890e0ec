import { Role, Turn } from './types';
import { HistoryMessage } from '../agents/LLMUtils';
import { dbg } from '../utils';

type Clock = () => Date;

/**
 * Append-only transcript of one interactive session.
 * The whole transcript is replayed to the model on every turn; nothing is evicted or summarized.
 */
export class ConversationMemory {
    private entries: Turn[] = [];

    /**
     * @param now - Clock used to stamp appended turns.
     */
    constructor(private readonly now: Clock = () => new Date()) {}

    get size(): number {
        return this.entries.length;
    }

    /**
     * Appends a turn at the end of the transcript.
     * @returns The stored turn.
     */
    append(role: Role, content: string): Turn {
        const turn: Turn = { role, content, timestamp: this.now() };
        this.entries.push(turn);
        dbg(`ConversationMemory: appended ${role} turn #${this.entries.length}`);
        return copyTurn(turn);
    }

    /** All turns in the order they happened. */
    turns(): Turn[] {
        return this.entries.map(copyTurn);
    }

    /** The transcript in the shape the model client replays. */
    toHistory(): HistoryMessage[] {
        return this.entries.map(({ role, content }) => ({ role, content }));
    }

    /** Drops every turn. Only called when the session ends. */
    clear() {
        this.entries = [];
    }
}

function copyTurn(turn: Turn): Turn {
    return { role: turn.role, content: turn.content, timestamp: new Date(turn.timestamp.getTime()) };
}
