/**
 * ================================================================================
 * VOLUME COMMANDS - EBS Attach and Detach
 * ================================================================================
 *
 * USAGE:
 * ec2-cluster attach-volume demo --ebs-vol-id vol-0123 --device /dev/sdh
 * ec2-cluster detach-volume demo --ebs-vol-id vol-0123
 *
 * //? The volume must live in the same availability zone as the master
 *
 * @license BSD-3-Clause
 */

import { Command } from 'commander';
import { logger } from '../utils/logger';
import { parseClusterName, parseOptions, volumeOptionsSchema } from '../utils/validation';
import { RawOptions, createContext, handleCommandError, withRegion } from './shared';

export const attachVolumeCommand = withRegion(new Command('attach-volume'))
    .description('Attach an existing EBS volume to the master')
    .argument('<cluster-name>', 'Name of the cluster')
    .option('--ebs-vol-id <id>', 'Id of the EBS volume to attach')
    .option('--device <device>', 'Device name on the master', '/dev/sdh')
    .action(async (rawName: string, options: RawOptions) => {
        try {
            const clusterName = parseClusterName(rawName);
            const { ebsVolId, device } = parseOptions(volumeOptionsSchema, options);
            const { controller } = await createContext(options);

            const instanceId = await controller.attachVolume(clusterName, ebsVolId, device);
            logger.success(`Volume ${ebsVolId} attached to master ${instanceId}`);
        } catch (error) {
            handleCommandError('attach volume', error);
        }
    });

//? The cluster name is accepted for symmetry; detaching only needs the volume id
export const detachVolumeCommand = withRegion(new Command('detach-volume'))
    .description('Detach an EBS volume')
    .argument('<cluster-name>', 'Name of the cluster')
    .option('--ebs-vol-id <id>', 'Id of the EBS volume to detach')
    .action(async (rawName: string, options: RawOptions) => {
        try {
            parseClusterName(rawName);
            const { ebsVolId } = parseOptions(volumeOptionsSchema, options);
            const { controller } = await createContext(options);

            await controller.detachVolume(ebsVolId);
            logger.success(`Volume ${ebsVolId} detached`);
        } catch (error) {
            handleCommandError('detach volume', error);
        }
    });
