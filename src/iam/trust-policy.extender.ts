import AWS from 'aws-sdk';
import chalk from 'chalk';

import { TaskReporter } from '../interfaces/task-reporter.interface';
import { StepOptionsInterface } from '../interfaces/step-options.interface';

import {
  PolicyDocument,
  parsePolicyDocument,
  serializePolicyDocument,
  withAssumeRolePrincipal,
} from './policy-document';

export const roleArn = (accountId: string, roleName: string): string =>
  `arn:aws:iam::${accountId}:role/${roleName}`;

export class TrustPolicyExtender {
  constructor(private readonly iamClient: AWS.IAM = new AWS.IAM()) {}

  async getTrustPolicy(roleName: string): Promise<PolicyDocument> {
    const result = await this.iamClient
      .getRole({ RoleName: roleName })
      .promise();

    if (!result.Role.AssumeRolePolicyDocument) {
      throw new Error(`Role ${roleName} has no trust policy`);
    }

    return parsePolicyDocument(result.Role.AssumeRolePolicyDocument);
  }

  /**
   * Lets `principalArn` assume `roleName`, replacing any earlier statement
   * for the same principal. Resolves to the document read back from IAM.
   */
  async extend(
    task: TaskReporter,
    roleName: string,
    principalArn: string,
    options: StepOptionsInterface,
  ): Promise<PolicyDocument> {
    task.output = `fetching trust policy of ${roleName}...`;
    const current = await this.getTrustPolicy(roleName);
    const updated = withAssumeRolePrincipal(current, principalArn);

    if (options.dryRun) {
      task.output = chalk.dim(
        `would set trust policy of ${roleName} to:\n${serializePolicyDocument(
          updated,
        )}`,
      );
      return updated;
    }

    task.output = `updating trust policy of ${roleName}...`;
    await this.iamClient
      .updateAssumeRolePolicy({
        RoleName: roleName,
        PolicyDocument: JSON.stringify(updated),
      })
      .promise();

    task.output = `verifying trust policy of ${roleName}...`;
    return this.getTrustPolicy(roleName);
  }
}
