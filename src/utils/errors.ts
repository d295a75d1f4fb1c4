/**
 * ================================================================================
 * ERROR TYPES - Cluster Operation Failures
 * ================================================================================
 *
 * Every failure the cluster core surfaces is one of these classes. The CLI maps
 * the stable `code` to an operator hint and exits with status 1.
 *
 * @license BSD-3-Clause
 */

import type { Role } from '../types';

export type ClusterErrorCode =
    | 'VALIDATION'
    | 'ALREADY_EXISTS'
    | 'NOT_FOUND'
    | 'INCONSISTENT'
    | 'IMAGE_RESOLUTION'
    | 'PROVIDER'
    | 'PARTIAL_GRANT'
    | 'REMOTE_EXECUTION';

export abstract class ClusterError extends Error {
    abstract readonly code: ClusterErrorCode;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * Bad or missing options, or a provider response of unexpected shape
 */
export class ValidationError extends ClusterError {
    readonly code = 'VALIDATION';
}

export class AlreadyExistsError extends ClusterError {
    readonly code = 'ALREADY_EXISTS';

    constructor(readonly clusterName: string, readonly activeCount: number) {
        super(
            `There are already ${activeCount} active instance(s) in the groups of cluster ${clusterName}`
        );
    }
}

export class ClusterNotFoundError extends ClusterError {
    readonly code = 'NOT_FOUND';

    //? missing lists the roles whose groups were empty
    constructor(readonly clusterName: string, readonly missing: Role[], message: string) {
        super(message);
    }
}

export class InconsistentClusterError extends ClusterError {
    readonly code = 'INCONSISTENT';

    constructor(
        readonly clusterName: string,
        readonly instanceId: string,
        readonly groupNames: string[],
        message: string
    ) {
        super(message);
    }
}

export class ImageResolutionError extends ClusterError {
    readonly code = 'IMAGE_RESOLUTION';
}

/**
 * A gateway call failed; step names the call, role the group being provisioned
 */
export class ProviderError extends ClusterError {
    readonly code = 'PROVIDER';

    constructor(readonly step: string, cause: unknown, readonly role?: Role) {
        super(
            `${step}${role ? ` (${role})` : ''} failed: ${cause instanceof Error ? cause.message : String(cause)}`,
            { cause }
        );
    }
}

export class PartialGrantError extends ClusterError {
    readonly code = 'PARTIAL_GRANT';

    constructor(
        readonly granted: number,
        readonly requested: number,
        readonly instanceIds: string[]
    ) {
        super(`Only ${granted}/${requested} spot instances were granted within the wait budget`);
    }
}

export class RemoteExecutionError extends ClusterError {
    readonly code = 'REMOTE_EXECUTION';

    constructor(
        readonly host: string,
        readonly exitCode: number | undefined,
        readonly output: string,
        message: string
    ) {
        super(message);
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
