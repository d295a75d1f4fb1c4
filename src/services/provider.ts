/**
 * ================================================================================
 * PROVIDER GATEWAY - Cloud API Boundary
 * ================================================================================
 *
 * The narrow set of cloud calls the cluster core depends on. AwsProviderGateway
 * implements it against EC2; tests use an in-memory fake.
 *
 * //! IMPORTANT: implementations decode provider responses strictly and throw
 * //! ValidationError on unexpected shapes, so the core only sees these types
 *
 * @license BSD-3-Clause
 */

import type {
    InstanceRequest,
    ProviderInstance,
    ResolvedIngressRule,
    SecurityGroup,
    SpotInstanceRequest,
    SpotRequestStatus
} from '../types';

export interface ProviderGateway {
    listInstances(): Promise<ProviderInstance[]>;
    listSecurityGroups(): Promise<SecurityGroup[]>;
    createSecurityGroup(name: string, description: string): Promise<SecurityGroup>;
    authorizeIngress(group: SecurityGroup, rule: ResolvedIngressRule): Promise<void>;

    runInstances(request: InstanceRequest): Promise<ProviderInstance[]>;
    requestSpotInstances(request: SpotInstanceRequest): Promise<string[]>;
    pollSpotRequests(requestIds: string[]): Promise<SpotRequestStatus[]>;
    cancelSpotRequests(requestIds: string[]): Promise<void>;
    tagInstances(instanceIds: string[], request: InstanceRequest): Promise<void>;

    startInstances(instanceIds: string[]): Promise<void>;
    stopInstances(instanceIds: string[]): Promise<void>;
    terminateInstances(instanceIds: string[]): Promise<void>;

    attachVolume(volumeId: string, instanceId: string, device: string): Promise<void>;
    detachVolume(volumeId: string): Promise<void>;

    listZones(): Promise<string[]>;
    imageExists(imageId: string): Promise<boolean>;
}
