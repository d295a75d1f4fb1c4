#!/usr/bin/env node

/**
 * ================================================================================
 * EC2-CLUSTER - Command Line Entry Point
 * ================================================================================
 *
 * ec2-cluster <action> <cluster-name> [options]
 *
 * ACTIONS:
 * • launch / resume - Provision a cluster, or redo setup of a running one
 * • stop / start / destroy - Lifecycle of an existing cluster
 * • attach-volume / detach-volume - EBS volumes on the master
 * • login / get-master / status / exec - Access and inspection
 *
 * @license BSD-3-Clause
 */

import { Command } from 'commander';
import { logger } from './utils/logger';
import { launchCommand, resumeCommand } from './commands/launch';
import { stopCommand } from './commands/stop';
import { startCommand } from './commands/start';
import { destroyCommand } from './commands/destroy';
import { attachVolumeCommand, detachVolumeCommand } from './commands/volume';
import { loginCommand } from './commands/login';
import { getMasterCommand } from './commands/master';
import { statusCommand } from './commands/status';
import { execCommand } from './commands/exec';

const program = new Command('ec2-cluster')
    .description('Launch and manage master/worker compute clusters on EC2')
    .version('1.0.0')
    .option('-v, --verbose', 'Show debug output on the console')
    .hook('preAction', (thisCommand, actionCommand) => {
        logger.setVerbose(thisCommand.opts().verbose === true);
        logger.startExecution(`ec2-cluster ${actionCommand.name()} ${actionCommand.args.join(' ')}`);
    });

program
    .addCommand(launchCommand)
    .addCommand(resumeCommand)
    .addCommand(stopCommand)
    .addCommand(startCommand)
    .addCommand(destroyCommand)
    .addCommand(attachVolumeCommand)
    .addCommand(detachVolumeCommand)
    .addCommand(loginCommand)
    .addCommand(getMasterCommand)
    .addCommand(statusCommand)
    .addCommand(execCommand);

program.parseAsync(process.argv).catch((error: unknown) => {
    logger.error('Unexpected failure', error instanceof Error ? error : undefined);
    process.exit(1);
});
