/**
 * ================================================================================
 * VALIDATION UTILITY - Option Parsing and Launch Plans
 * ================================================================================
 *
 * zod schemas for the command-line options of every action. Raw commander values
 * are parsed here into typed options, so nothing reaches the provider before its
 * input has been checked.
 *
 * KEY FEATURES:
 * • Cluster Names - Safe for security group names and remote paths
 * • Instance Types - Checked against the EC2 SDK's known instance types
 * • Launch Plans - Frozen LaunchPlan built from launch options
 * • Identity Files - Must exist and be readable by the owner only
 *
 * @license BSD-3-Clause
 */

import { statSync } from 'fs';
import { _InstanceType } from '@aws-sdk/client-ec2';
import { z } from 'zod';
import type { LaunchPlan, SshCredential } from '../types';
import { imageClassOf } from '../services/image';
import { ValidationError } from './errors';

/**
 * ================================================================
 * AWS RESOURCE VALIDATION
 * ================================================================
 */

const KNOWN_INSTANCE_TYPES: ReadonlySet<string> = new Set(Object.values(_InstanceType));

export function isInstanceType(value: string): value is _InstanceType {
    return KNOWN_INSTANCE_TYPES.has(value);
}

export const DEFAULT_INSTANCE_TYPE = 'm1.xlarge';
export const DEFAULT_WAIT_SECONDS = 120;

//? 4 build threads by default, 8 on the high-performance image class
export const DEFAULT_BUILD_THREADS = 4;
export const HPC_BUILD_THREADS = 8;

/**
 * ================================================================
 * OPTION SCHEMAS
 * ================================================================
 */

export const clusterNameSchema = z
    .string()
    .regex(
        /^[A-Za-z0-9._-]{1,200}$/,
        'Cluster name must be 1-200 letters, digits, dots, dashes or underscores'
    );

const instanceTypeSchema = z.string().refine(isInstanceType, (value) => ({
    message: `Unknown instance type: ${value}`
}));

const optionalText = z
    .string()
    .optional()
    .transform((value) => (value && value.trim() !== '' ? value.trim() : undefined));

export const launchOptionsSchema = z
    .object({
        slaves: z.coerce.number().int().min(1).default(1),
        coordinators: z.coerce.number().int().min(0).default(0),
        instanceType: instanceTypeSchema.default(DEFAULT_INSTANCE_TYPE),
        masterInstanceType: instanceTypeSchema.optional(),
        zone: optionalText,
        ami: z.string().min(1).default('std'),
        keyPair: optionalText,
        wait: z.coerce.number().int().min(0).default(DEFAULT_WAIT_SECONDS),
        spotPrice: z.coerce.number().positive().optional(),
        spotWait: z.coerce.number().int().positive().optional(),
        acceptPartial: z.boolean().default(false),
        ebsVolSize: z.coerce.number().int().positive().optional(),
        resume: z.boolean().default(false)
    })
    .superRefine((options, context) => {
        if (options.spotPrice === undefined && options.spotWait !== undefined) {
            context.addIssue({ code: z.ZodIssueCode.custom, path: ['spotWait'], message: 'requires --spot-price' });
        }
        if (options.spotPrice === undefined && options.acceptPartial) {
            context.addIssue({ code: z.ZodIssueCode.custom, path: ['acceptPartial'], message: 'requires --spot-price' });
        }
    });

export type LaunchOptions = z.infer<typeof launchOptionsSchema>;

export const startOptionsSchema = z.object({
    wait: z.coerce.number().int().min(0).default(DEFAULT_WAIT_SECONDS)
});

export const volumeOptionsSchema = z.object({
    ebsVolId: z.string().trim().min(1, 'is required'),
    device: z.string().min(1).optional()
});

export const loginOptionsSchema = z.object({
    proxy: z.string().regex(/^([^:\s]+:)?\d{1,5}$/, 'must be [ADDRESS:]PORT').optional()
});

/**
 * Parse raw option values, converting zod issues into one ValidationError
 */
export function parseOptions<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown): T {
    const result = schema.safeParse(raw);
    if (result.success) {
        return result.data;
    }
    const issues = result.error.issues.map((issue) => {
        const [field] = issue.path;
        const flag = typeof field === 'string' ? `--${field.replace(/[A-Z]/g, (c) => `-${c.toLowerCase()}`)}` : 'value';
        return `${flag}: ${issue.message}`;
    });
    throw new ValidationError(`Invalid options: ${issues.join('; ')}`);
}

export function parseClusterName(raw: string): string {
    const result = clusterNameSchema.safeParse(raw);
    if (!result.success) {
        throw new ValidationError(result.error.issues.map((issue) => issue.message).join('; '));
    }
    return result.data;
}

/**
 * ================================================================
 * LAUNCH PLANS
 * ================================================================
 */

export function buildThreadsFor(imageSelector: string): number {
    return imageClassOf(imageSelector) === 'hpc' ? HPC_BUILD_THREADS : DEFAULT_BUILD_THREADS;
}

export function buildLaunchPlan(options: LaunchOptions): Readonly<LaunchPlan> {
    return Object.freeze({
        workerCount: options.slaves,
        coordinatorCount: options.coordinators,
        workerInstanceType: options.instanceType,
        masterInstanceType: options.masterInstanceType ?? options.instanceType,
        zone: options.zone,
        imageSelector: options.ami,
        keyPair: options.keyPair,
        spot: options.spotPrice === undefined
            ? undefined
            : Object.freeze({
                maxPrice: options.spotPrice,
                waitSeconds: options.spotWait,
                acceptPartial: options.acceptPartial
            }),
        volumeSizeGb: options.ebsVolSize,
        waitSeconds: options.wait,
        buildThreads: buildThreadsFor(options.ami)
    });
}

/**
 * ================================================================
 * IDENTITY FILES
 * ================================================================
 */

/**
 * @throws ValidationError when the file is missing, not owner-readable, or open
 *         to group or others
 */
export function validateIdentityFile(identityFile: string | undefined): string {
    if (!identityFile) {
        throw new ValidationError('An identity file is required (-i/--identity-file)');
    }

    let mode: number;
    try {
        mode = statSync(identityFile).mode;
    } catch {
        throw new ValidationError(`Identity file ${identityFile} does not exist`);
    }

    if ((mode & 0o400) === 0 || (mode & 0o077) !== 0) {
        throw new ValidationError(
            `Identity file ${identityFile} must be accessible only by you; fix it with: chmod 400 ${identityFile}`
        );
    }
    return identityFile;
}

export function sshCredential(identityFile: string | undefined, user: string): SshCredential {
    return { identityFile: validateIdentityFile(identityFile), user };
}
