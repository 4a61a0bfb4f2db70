import type { Logger } from '../logger.js';

/** Where a command writes its report and how it is logged */
export interface CommandIO {
  /** Report output (default: stdout) */
  out?: (text: string) => void;
  /** Overrides the logger built from the config file */
  logger?: Logger;
  env?: NodeJS.ProcessEnv;
}

export interface CommandResult {
  exitCode: number;
}

export function writeOut(io: CommandIO, text: string): void {
  const out = io.out ?? ((chunk: string) => process.stdout.write(chunk));
  out(text.endsWith('\n') ? text : `${text}\n`);
}
