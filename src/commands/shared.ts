/**
 * ================================================================================
 * COMMAND SUPPORT - Context, Common Options and Error Reporting
 * ================================================================================
 *
 * Every action command follows the same shape: parse its options, build the
 * controller for the chosen region, run, and on failure print an operator hint
 * for the error code before exiting with status 1.
 *
 * @license BSD-3-Clause
 */

import { Command } from 'commander';
import { ClusterController } from '../cluster/controller';
import { loadEnvironment, Settings } from '../config/settings';
import { AwsProviderGateway, ConfigService, ManifestImageResolver, SshExecutor } from '../services';
import type { BootstrapReport, SshCredential } from '../types';
import { ClusterError, ClusterErrorCode, ProviderError } from '../utils/errors';
import { logger } from '../utils/logger';
import { sshCredential } from '../utils/validation';

export type RawOptions = Record<string, unknown>;

export interface CommandContext {
    settings: Settings;
    region: string;
    controller: ClusterController;
}

/**
 * ================================================================
 * COMMON OPTIONS
 * ================================================================
 */

export function withRegion(command: Command): Command {
    return command.option('-r, --region <region>', 'EC2 region to use (default: AWS_REGION or us-west-2)');
}

export function withIdentityFile(command: Command): Command {
    return command.option('-i, --identity-file <file>', 'SSH private key for logging into instances (mode 400)');
}

export function stringOption(options: RawOptions, key: string): string | undefined {
    const value = options[key];
    return typeof value === 'string' && value !== '' ? value : undefined;
}

/**
 * ================================================================
 * CONTEXT
 * ================================================================
 */

export function loadCredential(options: RawOptions, settings: Settings): SshCredential {
    return sshCredential(stringOption(options, 'identityFile'), settings.remoteUser);
}

/**
 * Validate AWS credentials and wire the controller for the selected region
 */
export async function createContext(options: RawOptions, settings: Settings = loadEnvironment()): Promise<CommandContext> {
    const region = stringOption(options, 'region') ?? settings.region;

    const configService = new ConfigService(region, settings.profile);
    const accountId = await configService.validateAWSCredentials();
    logger.debug('Using AWS account', { accountId, region });

    const controller = new ClusterController(
        new AwsProviderGateway(region),
        new SshExecutor(),
        new ManifestImageResolver(settings.imageManifests),
        {
            pollIntervalMs: settings.pollIntervalMs,
            spotPollIntervalMs: settings.spotPollIntervalMs
        }
    );
    return { settings, region, controller };
}

/**
 * ================================================================
 * ERROR REPORTING
 * ================================================================
 */

const HINTS: Record<ClusterErrorCode, string> = {
    VALIDATION: 'Check the command options; run with --help for the accepted values',
    ALREADY_EXISTS: 'Use "launch --resume" to redo setup on the running cluster, or destroy it first',
    NOT_FOUND: 'Check the cluster name and the region (-r)',
    INCONSISTENT: 'Remove the instance from the extra security groups or terminate it, then retry',
    IMAGE_RESOLUTION: 'Pass a literal image id with -a, or check the image manifest URLs',
    PROVIDER: 'Check your AWS permissions and instance limits in the region',
    PARTIAL_GRANT: 'Raise --spot-price, extend --spot-wait, or pass --accept-partial',
    REMOTE_EXECUTION: 'Check that the identity file matches the key pair and that port 22 is reachable'
};

export function hintFor(error: unknown): string | undefined {
    if (error instanceof ProviderError && error.cause instanceof Error) {
        if (error.cause.name === 'UnauthorizedOperation') {
            return `Check that your IAM user may call ${error.step}`;
        }
        if (error.cause.name === 'InsufficientInstanceCapacity') {
            return 'Try another zone (-z) or instance type (-t)';
        }
    }
    if (error instanceof ProviderError && error.step === 'run-instances') {
        return 'Instances launched before the failure keep running; destroy the cluster to clean up';
    }
    return error instanceof ClusterError ? HINTS[error.code] : undefined;
}

/**
 * Report a failed action and exit with status 1
 */
export function handleCommandError(action: string, error: unknown): never {
    const message = error instanceof Error ? error.message : String(error);
    logger.error(`Failed to ${action}: ${message}`, error instanceof Error ? error : undefined);

    const hint = hintFor(error);
    if (hint) {
        logger.info(`Hint: ${hint}`);
    }
    process.exit(1);
}

/**
 * Bootstrap failures on individual nodes still fail the command
 */
export function reportBootstrap(report: BootstrapReport): void {
    if (report.failures.length === 0) {
        logger.success(`Configuration delivered to ${report.delivered.length} node(s)`);
        return;
    }
    for (const failure of report.failures) {
        logger.error(`Setup failed on ${failure.role} ${failure.host}: ${failure.message}`);
    }
    logger.info('Hint: fix the failing nodes and run "launch --resume"');
    process.exit(1);
}
