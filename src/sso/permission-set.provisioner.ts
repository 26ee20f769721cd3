import AWS from 'aws-sdk';
import chalk from 'chalk';

import { TaskReporter } from '../interfaces/task-reporter.interface';
import { POLICY_VERSION, PolicyDocument } from '../iam/policy-document';
import { PollOutcome, PollSettings, pollUntil } from '../poll';

export type ProvisioningState = {
  /** IN_PROGRESS, SUCCEEDED or FAILED */
  status: string;
  failureReason?: string;
};

export type PermissionSetSpec = {
  instanceArn: string;
  name: string;
  description: string;
  sessionDuration: string;
};

export const DEFAULT_PERMISSION_SET_NAME = 'EcsSsmAccess';

export const DEFAULT_SESSION_DURATION = 'PT8H';

export const ecsSsmAccessPolicy = (): PolicyDocument => ({
  Version: POLICY_VERSION,
  Statement: [
    {
      Sid: 'SSMSessionAndCommandPolicy',
      Effect: 'Allow',
      Action: [
        'ssm:StartSession',
        'ssm:DescribeSessions',
        'ssm:TerminateSession',
        'ssm:SendCommand',
      ],
      Resource: '*',
    },
    {
      Sid: 'ECSDescribeAndListTasksServices',
      Effect: 'Allow',
      Action: [
        'ecs:DescribeTasks',
        'ecs:ListTasks',
        'ecs:DescribeServices',
        'ecs:ListServices',
      ],
      Resource: '*',
    },
  ],
});

export class PermissionSetProvisioner {
  constructor(
    private readonly ssoAdminClient: AWS.SSOAdmin = new AWS.SSOAdmin(),
  ) {}

  async create(task: TaskReporter, spec: PermissionSetSpec): Promise<string> {
    task.output = `creating permission set ${spec.name}...`;
    const result = await this.ssoAdminClient
      .createPermissionSet({
        InstanceArn: spec.instanceArn,
        Name: spec.name,
        Description: spec.description,
        SessionDuration: spec.sessionDuration,
      })
      .promise();
    const permissionSetArn = result.PermissionSet?.PermissionSetArn;

    if (!permissionSetArn) {
      throw new Error(
        `Unexpected response, no ARN returned for permission set ${spec.name}`,
      );
    }

    task.output = `created ${permissionSetArn}`;
    return permissionSetArn;
  }

  async putInlinePolicy(
    task: TaskReporter,
    instanceArn: string,
    permissionSetArn: string,
    policy: PolicyDocument,
  ): Promise<void> {
    task.output = 'adding inline policy...';
    await this.ssoAdminClient
      .putInlinePolicyToPermissionSet({
        InstanceArn: instanceArn,
        PermissionSetArn: permissionSetArn,
        InlinePolicy: JSON.stringify(policy),
      })
      .promise();
  }

  async provision(
    task: TaskReporter,
    instanceArn: string,
    permissionSetArn: string,
    accountId: string,
  ): Promise<string> {
    task.output = `provisioning to account ${accountId}...`;
    const result = await this.ssoAdminClient
      .provisionPermissionSet({
        InstanceArn: instanceArn,
        PermissionSetArn: permissionSetArn,
        TargetType: 'AWS_ACCOUNT',
        TargetId: accountId,
      })
      .promise();
    const requestId = result.PermissionSetProvisioningStatus?.RequestId;

    if (!requestId) {
      throw new Error('Unexpected response, no provisioning request id');
    }

    task.output = `provisioning request ${requestId}`;
    return requestId;
  }

  async getProvisioningStatus(
    instanceArn: string,
    requestId: string,
  ): Promise<ProvisioningState> {
    const result = await this.ssoAdminClient
      .describePermissionSetProvisioningStatus({
        InstanceArn: instanceArn,
        ProvisionPermissionSetRequestId: requestId,
      })
      .promise();

    return {
      status: result.PermissionSetProvisioningStatus?.Status || '',
      failureReason: result.PermissionSetProvisioningStatus?.FailureReason,
    };
  }

  waitForProvisioning(
    task: TaskReporter,
    instanceArn: string,
    requestId: string,
    settings: PollSettings,
  ): Promise<PollOutcome<ProvisioningState>> {
    return pollUntil({
      ...settings,
      check: () => this.getProvisioningStatus(instanceArn, requestId),
      isSucceeded: state => state.status === 'SUCCEEDED',
      isFailed: state => state.status === 'FAILED',
      onPending: (state, attempt) => {
        task.output = chalk.dim(
          `attempt ${attempt}: current status ${state.status || 'unknown'}`,
        );
      },
    });
  }

  async describe(
    instanceArn: string,
    permissionSetArn: string,
  ): Promise<AWS.SSOAdmin.PermissionSet> {
    const result = await this.ssoAdminClient
      .describePermissionSet({
        InstanceArn: instanceArn,
        PermissionSetArn: permissionSetArn,
      })
      .promise();

    if (!result.PermissionSet) {
      throw new Error(`Permission set ${permissionSetArn} was not found`);
    }

    return result.PermissionSet;
  }
}
