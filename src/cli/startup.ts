import { AppConfig, loadConfig } from '../config';
import { AppError } from '../errors';
import { formatError } from './display';

export const GENERAL_ERROR = 1;

/**
 * Loads the config, or prints the problem and ends the process with the error's exit code.
 * A missing key or a malformed setting ends the process before the shell starts.
 */
export function loadConfigOrExit(env: Record<string, string | undefined> = process.env): AppConfig {
    try {
        return loadConfig(env);
    } catch (error) {
        console.error(formatError(error));
        return process.exit(error instanceof AppError ? error.code : GENERAL_ERROR);
    }
}
