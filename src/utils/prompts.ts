/**
 * ================================================================================
 * CONFIRMATION PROMPTS
 * ================================================================================
 *
 * Stop and destroy need a confirmation token equal to the cluster name. The
 * operator types it here, or passes --yes to supply it non-interactively.
 *
 * @license BSD-3-Clause
 */

import inquirer from 'inquirer';
import chalk from 'chalk';

export type ConfirmedAction = 'stop' | 'destroy';

const WARNINGS: Record<ConfirmedAction, string> = {
    stop: 'Data on ephemeral instance-store volumes will be lost; EBS volumes are kept.',
    destroy: 'ALL DATA ON ALL NODES WILL BE LOST.'
};

/**
 * Ask the operator to retype the cluster name; resolves with what was typed
 */
export async function promptConfirmation(action: ConfirmedAction, clusterName: string): Promise<string> {
    console.log(chalk.yellow(`Are you sure you want to ${action} cluster ${clusterName}?`));
    console.log(chalk.yellow(WARNINGS[action]));

    const { token } = await inquirer.prompt<{ token: string }>([
        {
            type: 'input',
            name: 'token',
            message: `Type the cluster name to ${action} it:`
        }
    ]);
    return token.trim();
}

export async function confirmationToken(
    action: ConfirmedAction,
    clusterName: string,
    assumeYes: boolean
): Promise<string> {
    return assumeYes ? clusterName : promptConfirmation(action, clusterName);
}
