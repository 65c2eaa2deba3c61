// src/cli/context.ts
import { readFile, writeFile } from 'fs/promises';
import { constants } from 'os';
import { DependencyContainer } from 'tsyringe';

/** Side effects of the CLI, replaceable in tests */
export interface CliIO {
    out(text: string): void;
    readFile(filePath: string): Promise<Buffer>;
    writeFile(filePath: string, content: Buffer): Promise<void>;
}

export const processIO: CliIO = {
    out: text => { process.stdout.write(`${text}\n`); },
    readFile: filePath => readFile(filePath),
    writeFile: (filePath, content) => writeFile(filePath, content),
};

export interface CliContext {
    readonly container: DependencyContainer;
    readonly io: CliIO;
    /** Exit status the process should end with */
    exitCode: number;
}

export function printJson(io: CliIO, value: unknown): void {
    io.out(JSON.stringify(value, null, 2));
}

/** Shell convention for a process ended by a signal: 128 plus the signal number */
export function signalExitCode(signal: 'SIGINT' | 'SIGTERM'): number {
    return 128 + constants.signals[signal];
}
