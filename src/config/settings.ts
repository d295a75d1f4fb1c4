/**
 * ================================================================================
 * SETTINGS - Environment Configuration
 * ================================================================================
 *
 * Reads tool settings from the process environment (after dotenv has loaded
 * `.env`) and validates them once at startup.
 *
 * ENVIRONMENT VARIABLES:
 * • AWS_REGION - Default region when -r is not given (us-west-2)
 * • AWS_PROFILE - Shared config profile
 * • CLUSTER_REMOTE_USER - Login user on cluster nodes (ubuntu)
 * • CLUSTER_STD_IMAGE_URL / CLUSTER_HPC_IMAGE_URL - Image manifest URLs
 * • CLUSTER_POLL_INTERVAL_MS - Instance state poll interval (5000)
 * • CLUSTER_SPOT_POLL_INTERVAL_MS - Spot grant poll interval (10000)
 * • CLUSTER_LOG_FILE - JSON log path, read by the logger
 *
 * @license BSD-3-Clause
 */

import dotenv from 'dotenv';
import { z } from 'zod';
import type { ImageManifests } from '../services/image';
import { ValidationError } from '../utils/errors';

export const DEFAULT_REGION = 'us-west-2';

const settingsSchema = z.object({
    AWS_REGION: z.string().min(1).default(DEFAULT_REGION),
    AWS_PROFILE: z.string().min(1).optional(),
    CLUSTER_REMOTE_USER: z.string().min(1).default('ubuntu'),
    CLUSTER_STD_IMAGE_URL: z.string().url().default('https://s3.amazonaws.com/GraphLabGit/graphlab2-std'),
    CLUSTER_HPC_IMAGE_URL: z.string().url().default('https://s3.amazonaws.com/GraphLabGit/graphlab2-hvm'),
    CLUSTER_POLL_INTERVAL_MS: z.coerce.number().int().positive().default(5000),
    CLUSTER_SPOT_POLL_INTERVAL_MS: z.coerce.number().int().positive().default(10000),
    CLUSTER_LOG_FILE: z.string().min(1).optional()
});

export interface Settings {
    region: string;
    profile?: string;
    remoteUser: string;
    imageManifests: ImageManifests;
    pollIntervalMs: number;
    spotPollIntervalMs: number;
    logFile?: string;
}

/**
 * Validate settings from an environment map; empty values count as unset
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
    const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''));
    const result = settingsSchema.safeParse(present);
    if (!result.success) {
        const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
        throw new ValidationError(`Invalid environment configuration: ${issues.join('; ')}`);
    }

    const values = result.data;
    return {
        region: values.AWS_REGION,
        profile: values.AWS_PROFILE,
        remoteUser: values.CLUSTER_REMOTE_USER,
        imageManifests: {
            standard: values.CLUSTER_STD_IMAGE_URL,
            hpc: values.CLUSTER_HPC_IMAGE_URL
        },
        pollIntervalMs: values.CLUSTER_POLL_INTERVAL_MS,
        spotPollIntervalMs: values.CLUSTER_SPOT_POLL_INTERVAL_MS,
        logFile: values.CLUSTER_LOG_FILE
    };
}

/**
 * Load `.env` into process.env, then validate
 */
export function loadEnvironment(): Settings {
    dotenv.config();
    return loadSettings(process.env);
}
