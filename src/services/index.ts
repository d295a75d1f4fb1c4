/**
 * ================================================================================
 * SERVICES MODULE - Provider, Remote Access and Configuration
 * ================================================================================
 *
 * USAGE:
 * import { AwsProviderGateway, SshExecutor } from '../services';
 *
 * @license BSD-3-Clause
 */

// Cloud API boundary
export * from './provider';
export * from './aws';

// Remote command channel
export * from './remote';
export * from './ssh';

// Image manifests and AWS context
export * from './image';
export * from './config';
