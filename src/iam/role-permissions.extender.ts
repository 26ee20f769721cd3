import AWS from 'aws-sdk';
import chalk from 'chalk';

import { TaskReporter } from '../interfaces/task-reporter.interface';
import { StepOptionsInterface } from '../interfaces/step-options.interface';

import {
  POLICY_VERSION,
  PolicyDocument,
  serializePolicyDocument,
} from './policy-document';

export type RdsAccessPolicy = {
  name: string;
  description: string;
  document: PolicyDocument;
};

export type RdsAccessPolicyArns = {
  connectPolicyArn: string;
  authTokenPolicyArn: string;
};

export const rdsDbResourceArn = (accountId: string): string =>
  `arn:aws:rds-db:*:${accountId}:*:*/*`;

export const rdsConnectPolicy = (
  accountId: string,
  prefix = '',
): RdsAccessPolicy => ({
  name: `${prefix}RDSConnectPolicy`,
  description: 'Policy for RDS IAM authentication connection',
  document: {
    Version: POLICY_VERSION,
    Statement: [
      {
        Effect: 'Allow',
        Action: ['rds-db:connect'],
        Resource: [rdsDbResourceArn(accountId)],
      },
    ],
  },
});

export const rdsAuthTokenPolicy = (
  accountId: string,
  prefix = '',
): RdsAccessPolicy => ({
  name: `${prefix}RDSAuthTokenGenerationPolicy`,
  description: 'Policy for generating RDS auth tokens',
  document: {
    Version: POLICY_VERSION,
    Statement: [
      {
        Effect: 'Allow',
        Action: [
          'rds:GetAuthenticationToken',
          'rds:DescribeDBClusters',
          'rds:DescribeDBInstances',
        ],
        Resource: [rdsDbResourceArn(accountId)],
      },
    ],
  },
});

/**
 * Grants roles RDS IAM authentication through two customer-managed policies.
 * Every call here is one-shot: errors are not caught.
 */
export class RolePermissionsExtender {
  constructor(private readonly iamClient: AWS.IAM = new AWS.IAM()) {}

  async createPolicies(
    task: TaskReporter,
    accountId: string,
    policyPrefix: string,
    options: StepOptionsInterface,
  ): Promise<RdsAccessPolicyArns> {
    return {
      connectPolicyArn: await this.createPolicy(
        task,
        accountId,
        rdsConnectPolicy(accountId, policyPrefix),
        options,
      ),
      authTokenPolicyArn: await this.createPolicy(
        task,
        accountId,
        rdsAuthTokenPolicy(accountId, policyPrefix),
        options,
      ),
    };
  }

  async attachPolicies(
    task: TaskReporter,
    roleName: string,
    arns: RdsAccessPolicyArns,
    options: StepOptionsInterface,
  ): Promise<void> {
    for (const policyArn of [arns.connectPolicyArn, arns.authTokenPolicyArn]) {
      if (options.dryRun) {
        task.output = chalk.dim(`would attach ${policyArn} to ${roleName}`);
        continue;
      }

      task.output = `attaching ${policyArn}...`;
      await this.iamClient
        .attachRolePolicy({ RoleName: roleName, PolicyArn: policyArn })
        .promise();
    }

    if (options.dryRun) {
      task.skip(chalk.dim(`skipped, would attach RDS policies to ${roleName}`));
      return;
    }

    task.output = `attached RDS policies to ${roleName}`;
  }

  async listAttachedPolicies(
    roleName: string,
  ): Promise<AWS.IAM.AttachedPolicy[]> {
    const policies: AWS.IAM.AttachedPolicy[] = [];
    let marker: string | undefined;

    do {
      const result = await this.iamClient
        .listAttachedRolePolicies({ RoleName: roleName, Marker: marker })
        .promise();

      policies.push(...(result.AttachedPolicies || []));
      marker = result.IsTruncated ? result.Marker : undefined;
    } while (marker);

    return policies;
  }

  private async createPolicy(
    task: TaskReporter,
    accountId: string,
    policy: RdsAccessPolicy,
    options: StepOptionsInterface,
  ): Promise<string> {
    if (options.dryRun) {
      task.output = chalk.dim(
        `would create ${policy.name}:\n${serializePolicyDocument(
          policy.document,
        )}`,
      );
      return `arn:aws:iam::${accountId}:policy/${policy.name}`;
    }

    task.output = `creating ${policy.name}...`;
    const result = await this.iamClient
      .createPolicy({
        PolicyName: policy.name,
        PolicyDocument: JSON.stringify(policy.document),
        Description: policy.description,
      })
      .promise();

    if (!result.Policy?.Arn) {
      throw new Error(`Unexpected response, no ARN returned for ${policy.name}`);
    }

    return result.Policy.Arn;
  }
}
