/**
 * ================================================================================
 * REMOTE EXECUTOR - Command and Copy Channel
 * ================================================================================
 *
 * Remote commands are built from argv arrays. Rendering to the single string the
 * remote shell receives happens here and nowhere else, with every argument
 * single-quoted, so callers never splice paths or credentials into a shell line.
 *
 * @license BSD-3-Clause
 */

import type { SshCredential } from '../types';
import { RemoteExecutionError, ValidationError } from '../utils/errors';

export interface RemoteResult {
    exitCode: number;
    stdout: string;
    stderr: string;
}

export interface InteractiveOptions {
    proxy?: string;                        // [ADDRESS:]PORT for a SOCKS proxy (-D)
}

export interface RemoteExecutor {
    run(host: string, credential: SshCredential, command: RemoteCommand): Promise<RemoteResult>;
    copy(host: string, credential: SshCredential, localPath: string, remotePath: string): Promise<void>;
    interactive(host: string, credential: SshCredential, options?: InteractiveOptions): Promise<number>;
}

const SAFE_ARGUMENT = /^[A-Za-z0-9_\-./=:,@%+]+$/;

export function quoteArgument(arg: string): string {
    if (arg !== '' && SAFE_ARGUMENT.test(arg)) {
        return arg;
    }
    return `'${arg.replace(/'/g, `'\\''`)}'`;
}

/**
 * Sequence of argv steps run with `&&`, optionally preceded by exported variables
 */
export class RemoteCommand {
    private constructor(
        private readonly steps: readonly (readonly string[])[],
        private readonly env: Readonly<Record<string, string>>,
        private readonly script?: string
    ) { }

    static of(program: string, ...args: string[]): RemoteCommand {
        return new RemoteCommand([[program, ...args]], {});
    }

    /**
     * Operator-supplied job text, passed verbatim to `sh -c` as a single argument
     */
    static shell(script: string): RemoteCommand {
        return new RemoteCommand([], {}, script);
    }

    then(program: string, ...args: string[]): RemoteCommand {
        return new RemoteCommand([...this.steps, [program, ...args]], this.env, this.script);
    }

    withEnv(env: Record<string, string>): RemoteCommand {
        return new RemoteCommand(this.steps, { ...this.env, ...env }, this.script);
    }

    render(): string {
        const parts = this.steps.map((step) => step.map(quoteArgument).join(' '));
        if (this.script !== undefined) {
            parts.push(['sh', '-c', this.script].map(quoteArgument).join(' '));
        }
        const body = parts.join(' && ');
        const exports = Object.entries(this.env);
        if (exports.length === 0) {
            return body;
        }
        const assignments = exports.map(([key, value]) => {
            if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(key)) {
                throw new ValidationError(`Invalid environment variable name: ${key}`);
            }
            return `${key}=${quoteArgument(value)}`;
        });
        return `export ${assignments.join(' ')} && ${body}`;
    }
}

/**
 * Run a command and turn a non-zero exit into a RemoteExecutionError
 */
export async function runOrThrow(
    executor: RemoteExecutor,
    host: string,
    credential: SshCredential,
    command: RemoteCommand
): Promise<RemoteResult> {
    const result = await executor.run(host, credential, command);
    if (result.exitCode !== 0) {
        const output = (result.stderr || result.stdout).trim();
        throw new RemoteExecutionError(
            host,
            result.exitCode,
            output,
            `Command failed on ${host} with exit code ${result.exitCode}${output ? `: ${output}` : ''}`
        );
    }
    return result;
}
