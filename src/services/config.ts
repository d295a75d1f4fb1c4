/**
 * ================================================================================
 * CONFIG SERVICE - AWS Context and Credential Checks
 * ================================================================================
 *
 * Holds the region and profile every AWS client of an invocation uses, and checks
 * credentials before an action touches EC2.
 *
 * CREDENTIAL CHECKS:
 * • Environment - AWS_ACCESS_KEY_ID and AWS_SECRET_ACCESS_KEY, unless a profile is set
 * • STS - GetCallerIdentity, which also yields the account id
 *
 * //! CRITICAL: validateAWSCredentials() must succeed before any EC2 call
 *
 * @license BSD-3-Clause
 */

import { STSClient, GetCallerIdentityCommand } from '@aws-sdk/client-sts';
import { logger } from '../utils/logger';
import { ValidationError, errorMessage } from '../utils/errors';

interface ClusterToolConfig {
    region: string;         // AWS region for all operations (e.g., 'us-west-2')
    accountId?: string;     // Populated after credential validation
    profile?: string;       // AWS shared config profile (optional)
}

export const REQUIRED_CREDENTIAL_VARIABLES = ['AWS_ACCESS_KEY_ID', 'AWS_SECRET_ACCESS_KEY'] as const;

export class ConfigService {
    private config: ClusterToolConfig;

    constructor(
        region: string,
        profile?: string,
        private readonly stsClient: STSClient = new STSClient({ region, ...(profile && { profile }) })
    ) {
        this.config = { region, profile };

        logger.debug('ConfigService initialized', {
            region,
            profile: profile || 'default'
        });
    }

    /**
     * ================================================================
     * CREDENTIAL VALIDATION
     * ================================================================
     */

    /**
     * Names of the required credential variables missing from env; a profile
     * supplies its own credentials, so none are required then
     */
    missingCredentialVariables(env: NodeJS.ProcessEnv = process.env): string[] {
        if (this.config.profile) {
            return [];
        }
        return REQUIRED_CREDENTIAL_VARIABLES.filter((name) => !env[name]);
    }

    /**
     * @throws ValidationError when credentials are missing or rejected by STS
     */
    async validateAWSCredentials(env: NodeJS.ProcessEnv = process.env): Promise<string> {
        const missing = this.missingCredentialVariables(env);
        if (missing.length > 0) {
            throw new ValidationError(`Missing AWS credentials: set ${missing.join(' and ')}`);
        }

        const timer = logger.timer('credential-validation');
        try {
            const result = await this.stsClient.send(new GetCallerIdentityCommand({}));
            if (!result.Account) {
                throw new ValidationError('STS returned no account id');
            }
            this.config.accountId = result.Account;

            logger.debug('Credential validation successful', {
                accountId: result.Account,
                arn: result.Arn,
                duration: timer.end()
            });
            return result.Account;
        } catch (error) {
            timer.end();
            if (error instanceof ValidationError) {
                throw error;
            }
            throw new ValidationError(`AWS credentials validation failed: ${errorMessage(error)}`, { cause: error });
        }
    }

    /**
     * ================================================================
     * CONFIGURATION ACCESS
     * ================================================================
     */

    getConfig(): ClusterToolConfig {
        return { ...this.config };
    }

    isConfigured(): boolean {
        return !!this.config.accountId;
    }
}
