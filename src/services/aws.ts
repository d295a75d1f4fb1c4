/**
 * ================================================================================
 * AWS PROVIDER GATEWAY - EC2 Implementation
 * ================================================================================
 *
 * Implements ProviderGateway with the AWS SDK v3 EC2 client. Every response is
 * decoded through a zod schema before it reaches the cluster core.
 *
 * KEY FEATURES:
 * • Instance Listing - Paginated DescribeInstances, all states
 * • Security Groups - Create by name, authorize peer-group and CIDR ingress
 * • Provisioning - On-demand RunInstances and tagged, launch-grouped spot requests;
 *   ungranted spot requests can be cancelled
 * • Lifecycle - Start, stop and terminate by instance id
 * • Volumes - Attach to and detach from instances
 *
 * PREREQUISITES:
 * • AWS credentials in the environment or shared config
 * • ec2:Describe*, RunInstances, RequestSpotInstances, Start/Stop/TerminateInstances,
 *   CreateSecurityGroup, AuthorizeSecurityGroupIngress, Attach/DetachVolume
 *
 * //! COST ALERT: runInstances and requestSpotInstances start hourly billing
 *
 * @license BSD-3-Clause
 */

import {
    AttachVolumeCommand,
    AuthorizeSecurityGroupIngressCommand,
    BlockDeviceMapping,
    CancelSpotInstanceRequestsCommand,
    CreateSecurityGroupCommand,
    CreateTagsCommand,
    DescribeAvailabilityZonesCommand,
    DescribeImagesCommand,
    DescribeInstancesCommand,
    DescribeSecurityGroupsCommand,
    DescribeSpotInstanceRequestsCommand,
    DetachVolumeCommand,
    EC2Client,
    IpPermission,
    RequestSpotInstancesCommand,
    RunInstancesCommand,
    StartInstancesCommand,
    StopInstancesCommand,
    Tag,
    TerminateInstancesCommand,
    _InstanceType
} from '@aws-sdk/client-ec2';
import { z } from 'zod';
import {
    INSTANCE_STATES,
    InstanceRequest,
    ProviderInstance,
    ResolvedIngressRule,
    SecurityGroup,
    SpotInstanceRequest,
    SpotRequestStatus
} from '../types';
import { BUILD_THREADS_TAG, CLUSTER_TAG, ROLE_TAG, roleGroupName } from '../cluster/groups';
import { ValidationError } from '../utils/errors';
import { isInstanceType } from '../utils/validation';
import { logger } from '../utils/logger';
import type { ProviderGateway } from './provider';

//? Extra volume device for a requested volume size; removed with the instance
export const VOLUME_DEVICE = '/dev/sdv';

/**
 * ================================================================================
 * RESPONSE SCHEMAS
 * ================================================================================
 */

const tagSchema = z.object({ Key: z.string().optional(), Value: z.string().optional() });

const instanceSchema = z.object({
    InstanceId: z.string(),
    State: z.object({ Name: z.enum(INSTANCE_STATES) }),
    InstanceType: z.string().optional(),
    PublicDnsName: z.string().optional(),
    PrivateDnsName: z.string().optional(),
    PrivateIpAddress: z.string().optional(),
    SecurityGroups: z.array(z.object({ GroupName: z.string().optional() })).optional(),
    Tags: z.array(tagSchema).optional(),
    LaunchTime: z.date().optional()
});

const describeInstancesSchema = z.object({
    Reservations: z.array(z.object({ Instances: z.array(instanceSchema).optional() })).optional(),
    NextToken: z.string().optional()
});

const runInstancesSchema = z.object({
    Instances: z.array(instanceSchema).min(1)
});

const describeSecurityGroupsSchema = z.object({
    SecurityGroups: z.array(z.object({
        GroupId: z.string(),
        GroupName: z.string(),
        IpPermissions: z.array(z.unknown()).optional()
    })).optional(),
    NextToken: z.string().optional()
});

const createSecurityGroupSchema = z.object({ GroupId: z.string() });

const spotRequestSchema = z.object({
    SpotInstanceRequestId: z.string(),
    State: z.enum(['open', 'active', 'closed', 'cancelled', 'failed', 'disabled']),
    InstanceId: z.string().optional()
});

const requestSpotSchema = z.object({ SpotInstanceRequests: z.array(spotRequestSchema).min(1) });
const describeSpotSchema = z.object({ SpotInstanceRequests: z.array(spotRequestSchema).optional() });

const describeZonesSchema = z.object({
    AvailabilityZones: z.array(z.object({ ZoneName: z.string() })).optional()
});

const describeImagesSchema = z.object({
    Images: z.array(z.object({ ImageId: z.string() })).optional()
});

function decode<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, operation: string): T {
    const result = schema.safeParse(value);
    if (!result.success) {
        const issues = result.error.issues
            .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; ');
        throw new ValidationError(`Unexpected ${operation} response: ${issues}`);
    }
    return result.data;
}

function toProviderInstance(instance: z.infer<typeof instanceSchema>): ProviderInstance {
    const tags: Record<string, string> = {};
    for (const tag of instance.Tags ?? []) {
        if (tag.Key !== undefined) {
            tags[tag.Key] = tag.Value ?? '';
        }
    }

    return {
        instanceId: instance.InstanceId,
        state: instance.State.Name,
        instanceType: instance.InstanceType,
        publicDns: instance.PublicDnsName || undefined,
        privateDns: instance.PrivateDnsName || undefined,
        privateIp: instance.PrivateIpAddress || undefined,
        groupNames: (instance.SecurityGroups ?? []).flatMap((group) => (group.GroupName ? [group.GroupName] : [])),
        tags,
        launchTime: instance.LaunchTime
    };
}

function toIpPermission(rule: ResolvedIngressRule): IpPermission {
    if (rule.kind === 'group') {
        return { IpProtocol: '-1', UserIdGroupPairs: [{ GroupId: rule.sourceGroupId }] };
    }
    return {
        IpProtocol: rule.protocol,
        FromPort: rule.fromPort,
        ToPort: rule.toPort,
        IpRanges: [{ CidrIp: rule.cidr }]
    };
}

function instanceTypeOf(request: InstanceRequest): _InstanceType {
    if (!isInstanceType(request.instanceType)) {
        throw new ValidationError(`Unknown instance type: ${request.instanceType}`);
    }
    return request.instanceType;
}

function instanceTags(request: InstanceRequest): Tag[] {
    const tags: Tag[] = [
        { Key: 'Name', Value: roleGroupName(request.clusterName, request.role) },
        { Key: 'ManagedBy', Value: 'ec2-cluster' },
        { Key: CLUSTER_TAG, Value: request.clusterName },
        { Key: ROLE_TAG, Value: request.role },
        { Key: 'ExecutionId', Value: logger.getExecutionId() }
    ];
    if (request.buildThreads !== undefined) {
        tags.push({ Key: BUILD_THREADS_TAG, Value: String(request.buildThreads) });
    }
    return tags;
}

function blockDevices(request: InstanceRequest): BlockDeviceMapping[] | undefined {
    if (request.volumeSizeGb === undefined) {
        return undefined;
    }
    return [{ DeviceName: VOLUME_DEVICE, Ebs: { VolumeSize: request.volumeSizeGb, DeleteOnTermination: true } }];
}

/**
 * ================================================================================
 * AWS PROVIDER GATEWAY CLASS
 * ================================================================================
 */
export class AwsProviderGateway implements ProviderGateway {
    private readonly ec2Client: EC2Client;

    constructor(region: string, client?: EC2Client) {
        this.ec2Client = client ?? new EC2Client({ region });
        logger.debug('EC2 gateway initialized', { region });
    }

    /**
     * ================================================================
     * DISCOVERY
     * ================================================================
     */

    async listInstances(): Promise<ProviderInstance[]> {
        const instances: ProviderInstance[] = [];
        let nextToken: string | undefined;

        do {
            const result = decode(
                describeInstancesSchema,
                await this.ec2Client.send(new DescribeInstancesCommand({ NextToken: nextToken })),
                'DescribeInstances'
            );
            for (const reservation of result.Reservations ?? []) {
                instances.push(...(reservation.Instances ?? []).map(toProviderInstance));
            }
            nextToken = result.NextToken || undefined;
        } while (nextToken);

        logger.debug('Instances listed', { count: instances.length });
        return instances;
    }

    async listSecurityGroups(): Promise<SecurityGroup[]> {
        const groups: SecurityGroup[] = [];
        let nextToken: string | undefined;

        do {
            const result = decode(
                describeSecurityGroupsSchema,
                await this.ec2Client.send(new DescribeSecurityGroupsCommand({ NextToken: nextToken })),
                'DescribeSecurityGroups'
            );
            for (const group of result.SecurityGroups ?? []) {
                groups.push({
                    groupId: group.GroupId,
                    name: group.GroupName,
                    ruleCount: group.IpPermissions?.length ?? 0
                });
            }
            nextToken = result.NextToken || undefined;
        } while (nextToken);

        return groups;
    }

    async listZones(): Promise<string[]> {
        const result = decode(
            describeZonesSchema,
            await this.ec2Client.send(new DescribeAvailabilityZonesCommand({
                Filters: [{ Name: 'state', Values: ['available'] }]
            })),
            'DescribeAvailabilityZones'
        );
        return (result.AvailabilityZones ?? []).map((zone) => zone.ZoneName);
    }

    /**
     * False when the provider does not know the id; other failures propagate
     */
    async imageExists(imageId: string): Promise<boolean> {
        try {
            const result = decode(
                describeImagesSchema,
                await this.ec2Client.send(new DescribeImagesCommand({ ImageIds: [imageId] })),
                'DescribeImages'
            );
            return (result.Images ?? []).some((image) => image.ImageId === imageId);
        } catch (error) {
            if (error instanceof Error && error.name.startsWith('InvalidAMIID')) {
                logger.debug('Image lookup rejected', { imageId, reason: error.name });
                return false;
            }
            throw error;
        }
    }

    /**
     * ================================================================
     * SECURITY GROUPS
     * ================================================================
     */

    async createSecurityGroup(name: string, description: string): Promise<SecurityGroup> {
        const result = decode(
            createSecurityGroupSchema,
            await this.ec2Client.send(new CreateSecurityGroupCommand({ GroupName: name, Description: description })),
            'CreateSecurityGroup'
        );
        logger.debug('Security group created', { name, groupId: result.GroupId });
        return { groupId: result.GroupId, name, ruleCount: 0 };
    }

    async authorizeIngress(group: SecurityGroup, rule: ResolvedIngressRule): Promise<void> {
        await this.ec2Client.send(new AuthorizeSecurityGroupIngressCommand({
            GroupId: group.groupId,
            IpPermissions: [toIpPermission(rule)]
        }));
    }

    /**
     * ================================================================
     * PROVISIONING
     * ================================================================
     */

    async runInstances(request: InstanceRequest): Promise<ProviderInstance[]> {
        const result = decode(
            runInstancesSchema,
            await this.ec2Client.send(new RunInstancesCommand({
                ImageId: request.imageId,
                InstanceType: instanceTypeOf(request),
                MinCount: request.count,
                MaxCount: request.count,
                KeyName: request.keyPair,
                SecurityGroupIds: request.securityGroupIds,
                Placement: request.zone ? { AvailabilityZone: request.zone } : undefined,
                BlockDeviceMappings: blockDevices(request),
                TagSpecifications: [{ ResourceType: 'instance', Tags: instanceTags(request) }]
            })),
            'RunInstances'
        );
        return result.Instances.map(toProviderInstance);
    }

    async requestSpotInstances(request: SpotInstanceRequest): Promise<string[]> {
        const result = decode(
            requestSpotSchema,
            await this.ec2Client.send(new RequestSpotInstancesCommand({
                SpotPrice: request.maxPrice.toFixed(3),
                InstanceCount: request.count,
                LaunchGroup: request.launchGroup,
                LaunchSpecification: {
                    ImageId: request.imageId,
                    InstanceType: instanceTypeOf(request),
                    KeyName: request.keyPair,
                    SecurityGroupIds: request.securityGroupIds,
                    Placement: request.zone ? { AvailabilityZone: request.zone } : undefined,
                    BlockDeviceMappings: blockDevices(request)
                },
                TagSpecifications: [
                    {
                        ResourceType: 'spot-instances-request',
                        Tags: [
                            { Key: CLUSTER_TAG, Value: request.clusterName },
                            { Key: ROLE_TAG, Value: request.role }
                        ]
                    }
                ]
            })),
            'RequestSpotInstances'
        );
        return result.SpotInstanceRequests.map((spot) => spot.SpotInstanceRequestId);
    }

    async pollSpotRequests(requestIds: string[]): Promise<SpotRequestStatus[]> {
        const result = decode(
            describeSpotSchema,
            await this.ec2Client.send(new DescribeSpotInstanceRequestsCommand({ SpotInstanceRequestIds: requestIds })),
            'DescribeSpotInstanceRequests'
        );
        return (result.SpotInstanceRequests ?? []).map((spot) => ({
            requestId: spot.SpotInstanceRequestId,
            state: spot.State,
            instanceId: spot.InstanceId
        }));
    }

    async cancelSpotRequests(requestIds: string[]): Promise<void> {
        await this.ec2Client.send(new CancelSpotInstanceRequestsCommand({ SpotInstanceRequestIds: requestIds }));
    }

    //? RequestSpotInstances only tags the request itself; granted instances are tagged here
    async tagInstances(instanceIds: string[], request: InstanceRequest): Promise<void> {
        await this.ec2Client.send(new CreateTagsCommand({ Resources: instanceIds, Tags: instanceTags(request) }));
    }

    /**
     * ================================================================
     * LIFECYCLE AND VOLUMES
     * ================================================================
     */

    async startInstances(instanceIds: string[]): Promise<void> {
        await this.ec2Client.send(new StartInstancesCommand({ InstanceIds: instanceIds }));
    }

    async stopInstances(instanceIds: string[]): Promise<void> {
        await this.ec2Client.send(new StopInstancesCommand({ InstanceIds: instanceIds }));
    }

    //! Irreversible: terminated instances and their attached /dev/sdv volumes are gone
    async terminateInstances(instanceIds: string[]): Promise<void> {
        await this.ec2Client.send(new TerminateInstancesCommand({ InstanceIds: instanceIds }));
    }

    async attachVolume(volumeId: string, instanceId: string, device: string): Promise<void> {
        await this.ec2Client.send(new AttachVolumeCommand({ VolumeId: volumeId, InstanceId: instanceId, Device: device }));
    }

    async detachVolume(volumeId: string): Promise<void> {
        await this.ec2Client.send(new DetachVolumeCommand({ VolumeId: volumeId }));
    }
}
