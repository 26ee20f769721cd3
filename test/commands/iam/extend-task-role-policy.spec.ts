import AWS from 'aws-sdk';
import AWSMock from 'aws-sdk-mock';
import nock from 'nock';
import { mockProcessStdout } from 'jest-mock-process';

jest.mock('../../../src/configure-aws');
import { configureAWS } from '../../../src/configure-aws';
jest.mock('../../../src/prompts');

import ExtendTaskRolePolicy from '../../../src/commands/iam/extend-task-role-policy';
import { createTestConfig, createTestSession } from '../../util';

describe('iam:extend-task-role-policy', () => {
  mockProcessStdout();

  beforeAll(() => {
    nock.disableNetConnect();
    AWSMock.setSDKInstance(AWS);
  });

  beforeEach(() => {
    jest.clearAllMocks();
    jest
      .mocked(configureAWS)
      .mockResolvedValue(createTestSession());
  });

  afterEach(() => {
    AWSMock.restore('IAM');
  });

  it('adds the database role to the assume-role policy of the task role', async () => {
    let document = encodeURIComponent(
      JSON.stringify({
        Version: '2012-10-17',
        Statement: [{ Effect: 'Allow', Action: 'sts:AssumeRole', Resource: [] }],
      }),
    );
    const listSpy = jest.fn().mockImplementation((params, callback) => {
      callback(null, {
        AttachedPolicies: [
          { PolicyName: 'ECSRDSAssumeRolePolicy', PolicyArn: 'arn:policy/assume' },
        ],
      });
    });
    AWSMock.mock('IAM', 'listAttachedRolePolicies', listSpy);
    AWSMock.mock(
      'IAM',
      'getPolicy',
      jest.fn().mockImplementation((params, callback) => {
        callback(null, { Policy: { DefaultVersionId: 'v1' } });
      }),
    );
    AWSMock.mock(
      'IAM',
      'getPolicyVersion',
      jest.fn().mockImplementation((params, callback) => {
        callback(null, { PolicyVersion: { Document: document } });
      }),
    );
    AWSMock.mock(
      'IAM',
      'listPolicyVersions',
      jest.fn().mockImplementation((params, callback) => {
        callback(null, { Versions: [{ VersionId: 'v1', IsDefaultVersion: true }] });
      }),
    );
    const createVersionSpy = jest
      .fn()
      .mockImplementation(
        (params: AWS.IAM.CreatePolicyVersionRequest, callback: Function) => {
          document = encodeURIComponent(params.PolicyDocument);
          callback(null, {});
        },
      );
    AWSMock.mock('IAM', 'createPolicyVersion', createVersionSpy);

    await ExtendTaskRolePolicy.run(
      [
        '--account-id',
        '444444444444',
        '--target-role',
        'db-role',
        '-m',
      ],
      createTestConfig(),
    );

    expect(listSpy).toBeCalledWith(
      expect.objectContaining({ RoleName: 'ECSTaskRole' }),
      expect.any(Function),
    );
    expect(createVersionSpy).toHaveBeenCalledTimes(1);
    expect(JSON.parse(decodeURIComponent(document)).Statement[0].Resource).toEqual([
      'arn:aws:iam::444444444444:role/db-role',
    ]);
  });
});
