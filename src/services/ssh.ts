/**
 * ================================================================================
 * SSH EXECUTOR - OpenSSH Client Implementation
 * ================================================================================
 *
 * Implements RemoteExecutor by spawning the local `ssh` and `scp` binaries.
 * Arguments go to the child process as an argv array; the only string a shell
 * ever parses is the remote command rendered by RemoteCommand.
 *
 * //? Host keys are not verified: cluster nodes are freshly launched and their
 * //? keys are unknown in advance
 * //! DEPENDENCY: requires an OpenSSH client on PATH
 *
 * @license BSD-3-Clause
 */

import execa from 'execa';
import type { SshCredential } from '../types';
import { RemoteExecutionError } from '../utils/errors';
import { logger } from '../utils/logger';
import type { InteractiveOptions, RemoteCommand, RemoteExecutor, RemoteResult } from './remote';

const CLIENT_OPTIONS = ['-o', 'StrictHostKeyChecking=no', '-o', 'BatchMode=yes'];

function identityArgs(credential: SshCredential): string[] {
    return [...CLIENT_OPTIONS, '-i', credential.identityFile];
}

export class SshExecutor implements RemoteExecutor {
    async run(host: string, credential: SshCredential, command: RemoteCommand): Promise<RemoteResult> {
        const args = [...identityArgs(credential), `${credential.user}@${host}`, command.render()];
        logger.debug('ssh', { host, args });

        const result = await execa('ssh', args, { reject: false });
        return { exitCode: result.exitCode, stdout: result.stdout, stderr: result.stderr };
    }

    async copy(host: string, credential: SshCredential, localPath: string, remotePath: string): Promise<void> {
        const args = ['-q', ...identityArgs(credential), localPath, `${credential.user}@${host}:${remotePath}`];
        logger.debug('scp', { host, args });

        const result = await execa('scp', args, { reject: false });
        if (result.exitCode !== 0) {
            const output = (result.stderr || result.stdout).trim();
            throw new RemoteExecutionError(
                host,
                result.exitCode,
                output,
                `Copying ${localPath} to ${host}:${remotePath} failed with exit code ${result.exitCode}` +
                (output ? `: ${output}` : '')
            );
        }
    }

    /**
     * Terminal session on the host; resolves with the session's exit code
     */
    async interactive(host: string, credential: SshCredential, options: InteractiveOptions = {}): Promise<number> {
        const args = [
            '-t',
            ...identityArgs(credential),
            ...(options.proxy ? ['-D', options.proxy] : []),
            `${credential.user}@${host}`
        ];
        logger.debug('ssh (interactive)', { host, args });

        const result = await execa('ssh', args, { reject: false, stdio: 'inherit' });
        return result.exitCode;
    }
}
