import AWS from 'aws-sdk';
import AWSMock from 'aws-sdk-mock';
import fs from 'fs';
import nock from 'nock';
import os from 'os';
import path from 'path';
import { mockProcessStdout } from 'jest-mock-process';

jest.mock('../../../src/configure-aws');
import { configureAWS } from '../../../src/configure-aws';

import OnboardPrivateRds from '../../../src/commands/rds/onboard-private';
import OnboardPublicRds from '../../../src/commands/rds/onboard-public';
import { createTestConfig, createTestSession } from '../../util';

describe('rds:onboard-private and rds:onboard-public', () => {
  mockProcessStdout();

  let dir: string;
  let authorizeSpy: jest.Mock;

  beforeAll(() => {
    nock.disableNetConnect();
    AWSMock.setSDKInstance(AWS);
  });

  beforeEach(() => {
    jest.clearAllMocks();
    jest
      .mocked(configureAWS)
      .mockResolvedValue(createTestSession());
    authorizeSpy = jest.fn().mockImplementation((params, callback) => {
      callback(null, {});
    });
    AWSMock.mock('EC2', 'authorizeSecurityGroupIngress', authorizeSpy);
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'rds-onboard-'));
  });

  afterEach(() => {
    AWSMock.restore('EC2');
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('onboards private databases for the requester CIDR', async () => {
    const configFile = path.join(dir, 'private.json');
    const auditFile = path.join(dir, 'private-details.txt');
    fs.writeFileSync(
      configFile,
      JSON.stringify({
        private_rds_configs: [
          { requester_cidr: '10.2.0.0/16', rds_security_groups: ['sg-a'] },
        ],
      }),
    );

    await OnboardPrivateRds.run(
      [configFile, '-m', '-a', auditFile],
      createTestConfig(),
    );

    expect(authorizeSpy).toHaveBeenCalledTimes(2);
    expect(fs.readFileSync(auditFile, 'utf-8')).toBe(
      [
        'Private RDS Security Group Updates:',
        'Requester CIDR: 10.2.0.0/16',
        'Security Groups: sg-a',
        '-'.repeat(40),
        '',
      ].join('\n'),
    );
  });

  it('onboards public databases for the CIDR and NAT gateway', async () => {
    const configFile = path.join(dir, 'public.json');
    const auditFile = path.join(dir, 'public-details.txt');
    fs.writeFileSync(
      configFile,
      JSON.stringify({
        public_rds_configs: [
          {
            requester_cidr: '10.3.0.0/16',
            requester_nat_gateway_ip: '198.51.100.4',
            rds_security_groups: ['sg-b'],
          },
          { requester_nat_gateway_ip: '198.51.100.5', rds_security_groups: ['sg-c'] },
        ],
      }),
    );

    await OnboardPublicRds.run(
      [configFile, '-m', '-a', auditFile],
      createTestConfig(),
    );

    // the second entry has no CIDR and is skipped
    expect(authorizeSpy).toHaveBeenCalledTimes(4);
    expect(fs.readFileSync(auditFile, 'utf-8')).toContain(
      'Requester NAT Gateway IP: 198.51.100.4\nSecurity Groups: sg-b\n',
    );
  });

  it('exits with 1 on extra arguments', async () => {
    await expect(
      OnboardPrivateRds.run(['a.json', 'b.json'], createTestConfig()),
    ).rejects.toMatchObject({ oclif: { exit: 1 } });
    expect(authorizeSpy).not.toHaveBeenCalled();
  });
});
