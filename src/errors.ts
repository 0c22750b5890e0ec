/**
 * Error types for the research shell.
 *
 * Startup errors (`MissingCredentialError`, `ConfigError`) end the process with their exit code.
 * Everything else is raised during a turn and is reported to the user without ending the session.
 */

export class AppError extends Error {
    /** Recovery suggestion shown to the user */
    public readonly hint?: string;
    /** Process exit code when the error is fatal */
    public readonly code: number;

    constructor(message: string, hint?: string, code: number = 1) {
        super(message);
        Object.setPrototypeOf(this, new.target.prototype);
        this.name = 'AppError';
        this.hint = hint;
        this.code = code;
    }
}

export class MissingCredentialError extends AppError {
    constructor(envVar: string) {
        super(
            `${envVar} is not set in environment variables.`,
            `Create a .env file with content: ${envVar}=your-key-here`,
            1
        );
        this.name = 'MissingCredentialError';
    }
}

export class ConfigError extends AppError {
    constructor(message: string, hint?: string) {
        super(message, hint ?? 'Check the values in your .env file', 2);
        this.name = 'ConfigError';
    }
}

export class UnknownToolError extends AppError {
    constructor(public readonly toolName: string, availableTools: string[]) {
        super(`Unknown tool "${toolName}". Available tools: ${availableTools.join(', ')}.`);
        this.name = 'UnknownToolError';
    }
}

export class ToolExecutionError extends AppError {
    constructor(public readonly toolName: string, cause: string) {
        super(`Tool "${toolName}" failed: ${cause}`);
        this.name = 'ToolExecutionError';
    }
}

export class RetrievalError extends AppError {
    constructor(public readonly url: string, reason: string) {
        super(`Could not retrieve ${url}: ${reason}`, 'Check the URL and try again');
        this.name = 'RetrievalError';
    }
}
