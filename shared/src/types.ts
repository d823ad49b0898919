/**
 * Shared types for subgap plugins
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVEL_NAMES: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

/** Writes one formatted log line. Defaults to the console. */
export type LogSink = (level: LogLevel, line: string) => void;

export type Sleep = (ms: number) => Promise<void>;

export type Clock = () => number;
