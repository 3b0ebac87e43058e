import type { Logger } from 'pino';

/** Minimal writable sink; satisfied by process.stdout and test buffers */
export interface OutputStream {
  write(chunk: string): unknown;
}

/**
 * Everything a command needs from its host process.
 */
export interface CliContext {
  stdout: OutputStream;
  stderr: OutputStream;
  /** Variables used to resolve `$NAME` references in env values */
  env: Readonly<Record<string, string | undefined>>;
  logger: Logger;
  setExitCode(code: number): void;
}
