import AWS from 'aws-sdk';
import AWSMock from 'aws-sdk-mock';
import nock from 'nock';

import { AuditLog } from '../../src/audit/audit-log';
import { PeeringConnectionRequester } from '../../src/network/peering-connection.requester';
import { createMockTask, MemoryStorage } from '../util';

const creation = {
  requesterVpcId: 'vpc-requester',
  accepterAccountId: '111111111111',
  accepterVpcId: 'vpc-accepter',
  accepterRegion: 'eu-west-1',
  peeringName: 'reporting',
  accepterCidr: '10.9.0.0/16',
  ecsSecurityGroupId: 'sg-ecs',
};

const succeed = (response: object = {}) =>
  jest.fn().mockImplementation((params, callback) => {
    callback(null, response);
  });

describe('peering-connection.requester', () => {
  let storage: MemoryStorage;

  beforeAll(() => {
    nock.disableNetConnect();
    AWSMock.setSDKInstance(AWS);
  });

  beforeEach(() => {
    storage = new MemoryStorage();
  });

  afterEach(() => {
    AWSMock.restore('EC2');
  });

  const createRequester = () =>
    new PeeringConnectionRequester(new AuditLog(storage, 'peering-details.txt'), {
      intervalMs: 1,
      maxAttempts: 2,
    });

  it('requests a tagged peering and wires the requester side', async () => {
    const createPeeringSpy = succeed({
      VpcPeeringConnection: { VpcPeeringConnectionId: 'pcx-9' },
    });
    AWSMock.mock('EC2', 'createVpcPeeringConnection', createPeeringSpy);
    AWSMock.mock(
      'EC2',
      'describeVpcPeeringConnections',
      succeed({ VpcPeeringConnections: [{ Status: { Code: 'active' } }] }),
    );
    AWSMock.mock(
      'EC2',
      'describeRouteTables',
      succeed({ RouteTables: [{ RouteTableId: 'rtb-9' }] }),
    );
    const createRouteSpy = succeed();
    AWSMock.mock('EC2', 'createRoute', createRouteSpy);
    const authorizeSpy = succeed();
    AWSMock.mock('EC2', 'authorizeSecurityGroupIngress', authorizeSpy);

    const outcome = await createRequester().process(createMockTask(), creation, {
      dryRun: false,
    });

    expect(outcome.status).toBe('completed');
    expect(createPeeringSpy).toBeCalledWith(
      expect.objectContaining({
        VpcId: 'vpc-requester',
        PeerOwnerId: '111111111111',
        PeerVpcId: 'vpc-accepter',
        PeerRegion: 'eu-west-1',
        TagSpecifications: [
          {
            ResourceType: 'vpc-peering-connection',
            Tags: [
              { Key: 'Name', Value: 'reporting-peering' },
              { Key: 'Purpose', Value: 'database-iam-jit' },
            ],
          },
        ],
      }),
      expect.any(Function),
    );
    expect(createRouteSpy).toBeCalledWith(
      {
        RouteTableId: 'rtb-9',
        DestinationCidrBlock: '10.9.0.0/16',
        VpcPeeringConnectionId: 'pcx-9',
      },
      expect.any(Function),
    );
    expect(authorizeSpy).toHaveBeenCalledTimes(2);
    expect(storage.files.get('peering-details.txt')).toBe(
      [
        'Peering Details for reporting:',
        'Peering ID: pcx-9',
        'Requester VPC: vpc-requester',
        'Accepter VPC: vpc-accepter',
        'Accepter CIDR: 10.9.0.0/16',
        '-'.repeat(40),
        '',
      ].join('\n'),
    );
  });

  it('fails when the peering is not accepted in time', async () => {
    AWSMock.mock(
      'EC2',
      'createVpcPeeringConnection',
      succeed({ VpcPeeringConnection: { VpcPeeringConnectionId: 'pcx-9' } }),
    );
    AWSMock.mock(
      'EC2',
      'describeVpcPeeringConnections',
      succeed({
        VpcPeeringConnections: [{ Status: { Code: 'pending-acceptance' } }],
      }),
    );
    const createRouteSpy = succeed();
    AWSMock.mock('EC2', 'createRoute', createRouteSpy);

    await expect(
      createRequester().process(createMockTask(), creation, { dryRun: false }),
    ).rejects.toThrowError(
      'peering connection pcx-9 was not accepted after 2 checks',
    );
    expect(createRouteSpy).not.toHaveBeenCalled();
    expect(storage.files.size).toBe(0);
  });

  it('skips entries with missing fields', async () => {
    const createPeeringSpy = succeed();
    AWSMock.mock('EC2', 'createVpcPeeringConnection', createPeeringSpy);

    const task = createMockTask();
    const outcome = await createRequester().process(
      task,
      { ...creation, accepterRegion: '', accepterCidr: '' },
      { dryRun: false },
    );

    expect(outcome).toEqual({
      status: 'skipped',
      reason: 'missing accepter_region, accepter_cidr',
    });
    expect(task.skip).toBeCalledWith(expect.any(String));
    expect(createPeeringSpy).not.toHaveBeenCalled();
  });

  it('does not request peerings once the run is interrupted', async () => {
    const createPeeringSpy = succeed();
    AWSMock.mock('EC2', 'createVpcPeeringConnection', createPeeringSpy);
    const controller = new AbortController();
    controller.abort();

    const outcome = await createRequester().process(createMockTask(), creation, {
      dryRun: false,
      signal: controller.signal,
    });

    expect(outcome).toEqual({ status: 'skipped', reason: 'interrupted' });
    expect(createPeeringSpy).not.toHaveBeenCalled();
  });

  it('does not request peerings on dry-run', async () => {
    const createPeeringSpy = succeed();
    AWSMock.mock('EC2', 'createVpcPeeringConnection', createPeeringSpy);

    const outcome = await createRequester().process(createMockTask(), creation, {
      dryRun: true,
    });

    expect(outcome.status).toBe('skipped');
    expect(createPeeringSpy).not.toHaveBeenCalled();
  });
});
