import AWS from 'aws-sdk';
import AWSMock from 'aws-sdk-mock';
import fs from 'fs';
import nock from 'nock';
import os from 'os';
import path from 'path';
import { mockProcessStdout } from 'jest-mock-process';

jest.mock('../../../src/configure-aws', () => ({
  ...jest.requireActual('../../../src/configure-aws'),
  configureAWS: jest.fn(),
}));
import { configureAWS } from '../../../src/configure-aws';

import AcceptPeering from '../../../src/commands/peering/accept';
import { createTestConfig, createTestSession } from '../../util';

const entry = (id: string) => ({
  requester_peering_id: id,
  accepter_vpc_id: 'vpc-accepter',
  requester_cidr: '10.1.0.0/16',
  requester_nat_gateway_ip: '',
  rds_security_groups: ['sg-a'],
});

const succeed = (response: object = {}) =>
  jest.fn().mockImplementation((params, callback) => {
    callback(null, response);
  });

describe('peering:accept', () => {
  const stdout = mockProcessStdout();

  let dir: string;
  let configFile: string;
  let auditFile: string;

  const run = (...extra: string[]) =>
    AcceptPeering.run(
      [configFile, '-m', '--poll-interval', '0', '--audit-file', auditFile, ...extra],
      createTestConfig(),
    );

  beforeAll(() => {
    nock.disableNetConnect();
    AWSMock.setSDKInstance(AWS);
  });

  beforeEach(() => {
    jest.clearAllMocks();
    jest
      .mocked(configureAWS)
      .mockResolvedValue(createTestSession());

    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'peering-accept-'));
    configFile = path.join(dir, 'peerings.json');
    auditFile = path.join(dir, 'accepter-details.txt');
  });

  afterEach(() => {
    AWSMock.restore('EC2');
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('names the credential source in the banner', async () => {
    fs.writeFileSync(configFile, JSON.stringify({ vpc_peerings: [] }));
    jest.mocked(configureAWS).mockResolvedValueOnce({
      ...createTestSession(),
      credentialSource: { kind: 'environment' },
    });

    await run();

    const printed = stdout.mock.calls.map(([chunk]) => String(chunk)).join('');
    expect(printed).toContain('AWS credentials: ');
    expect(printed).toContain('environment variables');
  });

  it('accepts every listed peering and appends a record for each', async () => {
    fs.writeFileSync(
      configFile,
      JSON.stringify({ vpc_peerings: [entry('pcx-1'), entry('pcx-2')] }),
    );
    const acceptSpy = succeed();
    AWSMock.mock('EC2', 'acceptVpcPeeringConnection', acceptSpy);
    AWSMock.mock(
      'EC2',
      'describeVpcPeeringConnections',
      succeed({ VpcPeeringConnections: [{ Status: { Code: 'active' } }] }),
    );
    AWSMock.mock(
      'EC2',
      'describeRouteTables',
      succeed({ RouteTables: [{ RouteTableId: 'rtb-1' }] }),
    );
    AWSMock.mock('EC2', 'createRoute', succeed());
    const authorizeSpy = succeed();
    AWSMock.mock('EC2', 'authorizeSecurityGroupIngress', authorizeSpy);

    await run();

    expect(configureAWS).toBeCalledWith('default', 'eu-central-1');
    expect(acceptSpy).toHaveBeenCalledTimes(2);
    expect(authorizeSpy).toHaveBeenCalledTimes(4);

    const audit = fs.readFileSync(auditFile, 'utf-8');
    expect(audit.split('Accepted Peering Details:\n')).toHaveLength(3);
    expect(audit).toContain('Peering ID: pcx-2\n');
  });

  it('continues with the next entry and fails at the end', async () => {
    fs.writeFileSync(
      configFile,
      JSON.stringify({ vpc_peerings: [entry('pcx-1'), entry('pcx-2')] }),
    );
    AWSMock.mock(
      'EC2',
      'acceptVpcPeeringConnection',
      jest
        .fn()
        .mockImplementationOnce((params, callback) => {
          callback(
            Object.assign(new Error('not allowed'), {
              code: 'UnauthorizedOperation',
            }),
            null,
          );
        })
        .mockImplementationOnce((params, callback) => {
          callback(null, {});
        }),
    );
    AWSMock.mock(
      'EC2',
      'describeVpcPeeringConnections',
      succeed({ VpcPeeringConnections: [{ Status: { Code: 'active' } }] }),
    );
    AWSMock.mock(
      'EC2',
      'describeRouteTables',
      succeed({ RouteTables: [{ RouteTableId: 'rtb-1' }] }),
    );
    AWSMock.mock('EC2', 'createRoute', succeed());
    AWSMock.mock('EC2', 'authorizeSecurityGroupIngress', succeed());

    await expect(run()).rejects.toThrowError('PartialFailure');

    const audit = fs.readFileSync(auditFile, 'utf-8');
    expect(audit).toContain('Peering ID: pcx-2\n');
    expect(audit).not.toContain('pcx-1');
  });

  it('stops on Ctrl+C and leaves the remaining entries untouched', async () => {
    fs.writeFileSync(
      configFile,
      JSON.stringify({
        vpc_peerings: [entry('pcx-1'), entry('pcx-2'), entry('pcx-3')],
      }),
    );
    const acceptSpy = succeed();
    AWSMock.mock('EC2', 'acceptVpcPeeringConnection', acceptSpy);
    AWSMock.mock(
      'EC2',
      'describeVpcPeeringConnections',
      jest.fn().mockImplementation((params, callback) => {
        process.emit('SIGINT');
        callback(null, {
          VpcPeeringConnections: [{ Status: { Code: 'pending-acceptance' } }],
        });
      }),
    );
    const describeRouteTablesSpy = succeed({ RouteTables: [] });
    AWSMock.mock('EC2', 'describeRouteTables', describeRouteTablesSpy);
    const createRouteSpy = succeed();
    AWSMock.mock('EC2', 'createRoute', createRouteSpy);
    const authorizeSpy = succeed();
    AWSMock.mock('EC2', 'authorizeSecurityGroupIngress', authorizeSpy);
    const listeners = process.listenerCount('SIGINT');

    await expect(run()).rejects.toThrowError('PartialFailure');

    expect(acceptSpy).toHaveBeenCalledTimes(1);
    expect(acceptSpy).toBeCalledWith(
      { VpcPeeringConnectionId: 'pcx-1' },
      expect.any(Function),
    );
    expect(describeRouteTablesSpy).not.toHaveBeenCalled();
    expect(createRouteSpy).not.toHaveBeenCalled();
    expect(authorizeSpy).not.toHaveBeenCalled();
    expect(fs.existsSync(auditFile)).toBe(false);
    expect(process.listenerCount('SIGINT')).toBe(listeners);
  });

  it('makes no changes on dry-run', async () => {
    fs.writeFileSync(configFile, JSON.stringify({ vpc_peerings: [entry('pcx-1')] }));
    const acceptSpy = succeed();
    AWSMock.mock('EC2', 'acceptVpcPeeringConnection', acceptSpy);
    AWSMock.mock(
      'EC2',
      'describeRouteTables',
      succeed({ RouteTables: [{ RouteTableId: 'rtb-1' }] }),
    );
    const createRouteSpy = succeed();
    AWSMock.mock('EC2', 'createRoute', createRouteSpy);

    await run('--dry-run');

    expect(acceptSpy).not.toHaveBeenCalled();
    expect(createRouteSpy).not.toHaveBeenCalled();
    expect(fs.existsSync(auditFile)).toBe(false);
  });

  it('exits with 1 when the config argument is missing', async () => {
    await expect(
      AcceptPeering.run(['-m'], createTestConfig()),
    ).rejects.toMatchObject({ oclif: { exit: 1 } });
    expect(configureAWS).not.toHaveBeenCalled();
  });

  it('fails on a config file that is not JSON', async () => {
    fs.writeFileSync(configFile, 'vpc_peerings:');

    await expect(run()).rejects.toThrowError(/is not valid JSON/);
  });
});
