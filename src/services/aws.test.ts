import {
    AuthorizeSecurityGroupIngressCommand,
    CancelSpotInstanceRequestsCommand,
    CreateTagsCommand,
    DescribeImagesCommand,
    DescribeInstancesCommand,
    DescribeSecurityGroupsCommand,
    DescribeSpotInstanceRequestsCommand,
    RequestSpotInstancesCommand,
    RunInstancesCommand,
    TerminateInstancesCommand
} from '@aws-sdk/client-ec2';
import type { EC2Client } from '@aws-sdk/client-ec2';
import { AwsProviderGateway, VOLUME_DEVICE } from './aws';
import type { InstanceRequest } from '../types';
import { ValidationError } from '../utils/errors';
import { quietConsole } from '../__tests__/fakes';

const REQUEST: InstanceRequest = {
    clusterName: 'demo',
    role: 'worker',
    count: 2,
    instanceType: 'm5.large',
    imageId: 'ami-test',
    zone: 'us-west-2a',
    securityGroupIds: ['sg-1']
};

function awsError(name: string, message: string): Error {
    const error = new Error(message);
    error.name = name;
    return error;
}

describe('AwsProviderGateway', () => {
    let mockEc2Send: jest.Mock;
    let gateway: AwsProviderGateway;

    beforeEach(() => {
        quietConsole();
        mockEc2Send = jest.fn();
        gateway = new AwsProviderGateway('us-west-2', { send: mockEc2Send } as unknown as EC2Client);
    });

    describe('listInstances', () => {
        it('follows pagination and decodes every instance', async () => {
            mockEc2Send
                .mockResolvedValueOnce({
                    Reservations: [{
                        Instances: [{
                            InstanceId: 'i-1',
                            State: { Name: 'running' },
                            InstanceType: 'm5.large',
                            PublicDnsName: 'ec2-1.compute.example.com',
                            PrivateDnsName: 'ip-10-0-0-1.internal',
                            SecurityGroups: [{ GroupName: 'demo-master' }],
                            Tags: [{ Key: 'cluster-name', Value: 'demo' }]
                        }]
                    }],
                    NextToken: 'page-2'
                })
                .mockResolvedValueOnce({
                    Reservations: [{
                        Instances: [{
                            InstanceId: 'i-2',
                            State: { Name: 'stopped' },
                            PublicDnsName: '',
                            PrivateIpAddress: '10.0.0.2'
                        }]
                    }]
                });

            const instances = await gateway.listInstances();

            expect(mockEc2Send).toHaveBeenCalledTimes(2);
            expect(mockEc2Send.mock.calls[1][0]).toBeInstanceOf(DescribeInstancesCommand);
            expect(mockEc2Send.mock.calls[1][0].input).toEqual({ NextToken: 'page-2' });
            expect(instances).toEqual([
                {
                    instanceId: 'i-1',
                    state: 'running',
                    instanceType: 'm5.large',
                    publicDns: 'ec2-1.compute.example.com',
                    privateDns: 'ip-10-0-0-1.internal',
                    privateIp: undefined,
                    groupNames: ['demo-master'],
                    tags: { 'cluster-name': 'demo' },
                    launchTime: undefined
                },
                {
                    instanceId: 'i-2',
                    state: 'stopped',
                    instanceType: undefined,
                    publicDns: undefined,
                    privateDns: undefined,
                    privateIp: '10.0.0.2',
                    groupNames: [],
                    tags: {},
                    launchTime: undefined
                }
            ]);
        });

        it('rejects a response with an unknown instance state', async () => {
            mockEc2Send.mockResolvedValueOnce({
                Reservations: [{ Instances: [{ InstanceId: 'i-1', State: { Name: 'exploded' } }] }]
            });

            const listing = gateway.listInstances();

            await expect(listing).rejects.toThrow(ValidationError);
            await expect(listing).rejects.toThrow(
                /^Unexpected DescribeInstances response: Reservations\.0\.Instances\.0\.State\.Name: /
            );
        });
    });

    describe('security groups', () => {
        it('counts the ingress rules of each group', async () => {
            mockEc2Send.mockResolvedValueOnce({
                SecurityGroups: [
                    { GroupId: 'sg-1', GroupName: 'demo-master', IpPermissions: [{}, {}] },
                    { GroupId: 'sg-2', GroupName: 'demo-slaves' }
                ]
            });

            await expect(gateway.listSecurityGroups()).resolves.toEqual([
                { groupId: 'sg-1', name: 'demo-master', ruleCount: 2 },
                { groupId: 'sg-2', name: 'demo-slaves', ruleCount: 0 }
            ]);
            expect(mockEc2Send.mock.calls[0][0]).toBeInstanceOf(DescribeSecurityGroupsCommand);
        });

        it('maps peer-group and CIDR rules to IP permissions', async () => {
            mockEc2Send.mockResolvedValue({});
            const group = { groupId: 'sg-1', name: 'demo-master', ruleCount: 0 };

            await gateway.authorizeIngress(group, { kind: 'group', sourceGroupId: 'sg-2' });
            await gateway.authorizeIngress(group, {
                kind: 'cidr',
                protocol: 'tcp',
                fromPort: 22,
                toPort: 22,
                cidr: '0.0.0.0/0'
            });

            const [peer, cidr] = mockEc2Send.mock.calls.map(([command]) => command);
            expect(peer).toBeInstanceOf(AuthorizeSecurityGroupIngressCommand);
            expect(peer.input).toEqual({
                GroupId: 'sg-1',
                IpPermissions: [{ IpProtocol: '-1', UserIdGroupPairs: [{ GroupId: 'sg-2' }] }]
            });
            expect(cidr.input).toEqual({
                GroupId: 'sg-1',
                IpPermissions: [{ IpProtocol: 'tcp', FromPort: 22, ToPort: 22, IpRanges: [{ CidrIp: '0.0.0.0/0' }] }]
            });
        });
    });

    describe('provisioning', () => {
        it('runs tagged instances in the requested zone', async () => {
            mockEc2Send.mockResolvedValueOnce({
                Instances: [
                    { InstanceId: 'i-1', State: { Name: 'pending' } },
                    { InstanceId: 'i-2', State: { Name: 'pending' } }
                ]
            });

            const instances = await gateway.runInstances({ ...REQUEST, volumeSizeGb: 50 });

            expect(instances.map((instance) => instance.instanceId)).toEqual(['i-1', 'i-2']);
            const command = mockEc2Send.mock.calls[0][0];
            expect(command).toBeInstanceOf(RunInstancesCommand);
            expect(command.input).toMatchObject({
                ImageId: 'ami-test',
                InstanceType: 'm5.large',
                MinCount: 2,
                MaxCount: 2,
                SecurityGroupIds: ['sg-1'],
                Placement: { AvailabilityZone: 'us-west-2a' },
                BlockDeviceMappings: [
                    { DeviceName: VOLUME_DEVICE, Ebs: { VolumeSize: 50, DeleteOnTermination: true } }
                ]
            });
            expect(command.input.TagSpecifications[0].Tags).toEqual(
                expect.arrayContaining([
                    { Key: 'Name', Value: 'demo-slaves' },
                    { Key: 'cluster-name', Value: 'demo' },
                    { Key: 'cluster-role', Value: 'worker' }
                ])
            );
        });

        it('refuses an unknown instance type without calling EC2', async () => {
            await expect(gateway.runInstances({ ...REQUEST, instanceType: 'x9.enormous' })).rejects.toThrow(
                'Unknown instance type: x9.enormous'
            );
            expect(mockEc2Send).not.toHaveBeenCalled();
        });

        it('requests spot workers in one launch group and reads their status', async () => {
            mockEc2Send
                .mockResolvedValueOnce({
                    SpotInstanceRequests: [
                        { SpotInstanceRequestId: 'sir-1', State: 'open' },
                        { SpotInstanceRequestId: 'sir-2', State: 'open' }
                    ]
                })
                .mockResolvedValueOnce({
                    SpotInstanceRequests: [
                        { SpotInstanceRequestId: 'sir-1', State: 'active', InstanceId: 'i-9' },
                        { SpotInstanceRequestId: 'sir-2', State: 'open' }
                    ]
                });

            const ids = await gateway.requestSpotInstances({
                ...REQUEST,
                maxPrice: 0.12,
                launchGroup: 'launch-group-demo'
            });
            const statuses = await gateway.pollSpotRequests(ids);

            const [request, poll] = mockEc2Send.mock.calls.map(([command]) => command);
            expect(request).toBeInstanceOf(RequestSpotInstancesCommand);
            expect(request.input).toMatchObject({
                SpotPrice: '0.120',
                InstanceCount: 2,
                LaunchGroup: 'launch-group-demo'
            });
            expect(poll).toBeInstanceOf(DescribeSpotInstanceRequestsCommand);
            expect(poll.input).toEqual({ SpotInstanceRequestIds: ['sir-1', 'sir-2'] });
            expect(statuses).toEqual([
                { requestId: 'sir-1', state: 'active', instanceId: 'i-9' },
                { requestId: 'sir-2', state: 'open', instanceId: undefined }
            ]);
        });
    });

    describe('spot follow-up', () => {
        it('cancels ungranted spot requests by id', async () => {
            mockEc2Send.mockResolvedValueOnce({});

            await gateway.cancelSpotRequests(['sir-2']);

            const command = mockEc2Send.mock.calls[0][0];
            expect(command).toBeInstanceOf(CancelSpotInstanceRequestsCommand);
            expect(command.input).toEqual({ SpotInstanceRequestIds: ['sir-2'] });
        });

        it('tags granted instances like on-demand ones', async () => {
            mockEc2Send.mockResolvedValueOnce({});

            await gateway.tagInstances(['i-9'], { ...REQUEST, buildThreads: 8 });

            const command = mockEc2Send.mock.calls[0][0];
            expect(command).toBeInstanceOf(CreateTagsCommand);
            expect(command.input.Resources).toEqual(['i-9']);
            expect(command.input.Tags).toEqual(
                expect.arrayContaining([
                    { Key: 'Name', Value: 'demo-slaves' },
                    { Key: 'cluster-name', Value: 'demo' },
                    { Key: 'cluster-role', Value: 'worker' },
                    { Key: 'cluster-build-threads', Value: '8' }
                ])
            );
        });
    });

    describe('lifecycle', () => {
        it('terminates by instance id', async () => {
            mockEc2Send.mockResolvedValueOnce({});

            await gateway.terminateInstances(['i-1', 'i-2']);

            const command = mockEc2Send.mock.calls[0][0];
            expect(command).toBeInstanceOf(TerminateInstancesCommand);
            expect(command.input).toEqual({ InstanceIds: ['i-1', 'i-2'] });
        });
    });

    describe('imageExists', () => {
        it('finds a registered image', async () => {
            mockEc2Send.mockResolvedValueOnce({ Images: [{ ImageId: 'ami-test' }] });

            await expect(gateway.imageExists('ami-test')).resolves.toBe(true);
            expect(mockEc2Send.mock.calls[0][0]).toBeInstanceOf(DescribeImagesCommand);
        });

        it('treats a malformed or unknown id as missing', async () => {
            mockEc2Send.mockRejectedValueOnce(awsError('InvalidAMIID.NotFound', 'The image id does not exist'));

            await expect(gateway.imageExists('ami-gone')).resolves.toBe(false);
        });

        it('propagates other failures', async () => {
            mockEc2Send.mockRejectedValueOnce(awsError('RequestLimitExceeded', 'Slow down'));

            await expect(gateway.imageExists('ami-test')).rejects.toThrow('Slow down');
        });
    });
});
