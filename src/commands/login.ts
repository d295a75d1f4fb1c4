/**
 * ================================================================================
 * LOGIN COMMAND - Interactive Shell on the Master
 * ================================================================================
 *
 * USAGE:
 * ec2-cluster login demo -i ~/.ssh/demo.pem
 * ec2-cluster login demo -i ~/.ssh/demo.pem -D 8157
 *
 * @license BSD-3-Clause
 */

import { Command } from 'commander';
import { loginOptionsSchema, parseClusterName, parseOptions } from '../utils/validation';
import { loadEnvironment } from '../config/settings';
import {
    RawOptions,
    createContext,
    handleCommandError,
    loadCredential,
    withIdentityFile,
    withRegion
} from './shared';

export const loginCommand = withIdentityFile(withRegion(new Command('login')))
    .description('Open an SSH session on the master')
    .argument('<cluster-name>', 'Name of the cluster')
    .option('-D, --proxy <[address:]port>', 'Open a SOCKS proxy on this local port through the master')
    .action(async (rawName: string, options: RawOptions) => {
        try {
            const clusterName = parseClusterName(rawName);
            const { proxy } = parseOptions(loginOptionsSchema, options);
            const settings = loadEnvironment();
            const credential = loadCredential(options, settings);
            const { controller } = await createContext(options, settings);

            await controller.login(clusterName, credential, proxy);
        } catch (error) {
            handleCommandError('log in', error);
        }
    });
