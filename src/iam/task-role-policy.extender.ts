import AWS from 'aws-sdk';
import chalk from 'chalk';

import { TaskReporter } from '../interfaces/task-reporter.interface';
import { StepOptionsInterface } from '../interfaces/step-options.interface';

import {
  PolicyDocument,
  parsePolicyDocument,
  serializePolicyDocument,
  withAssumableResource,
} from './policy-document';
import { RolePermissionsExtender } from './role-permissions.extender';

// IAM keeps at most five versions of a managed policy.
export const MAX_POLICY_VERSIONS = 5;

export type TaskRolePolicyTarget = {
  roleName: string;
  policyName: string;
  resourceArn: string;
};

export type TaskRolePolicyOutcome = {
  policyArn: string;
  changed: boolean;
  document: PolicyDocument;
};

/**
 * Lets the ECS task role assume one more role by adding it to the resources
 * of the managed policy that grants `sts:AssumeRole`.
 */
export class TaskRolePolicyExtender {
  constructor(
    private readonly iamClient: AWS.IAM = new AWS.IAM(),
    private readonly rolePermissions = new RolePermissionsExtender(iamClient),
  ) {}

  async findAttachedPolicyArn(
    roleName: string,
    policyName: string,
  ): Promise<string | undefined> {
    const policies = await this.rolePermissions.listAttachedPolicies(roleName);

    return policies.find(policy => policy.PolicyName === policyName)
      ?.PolicyArn;
  }

  async getDefaultDocument(policyArn: string): Promise<PolicyDocument> {
    const { Policy: policy } = await this.iamClient
      .getPolicy({ PolicyArn: policyArn })
      .promise();

    if (!policy?.DefaultVersionId) {
      throw new Error(`Policy ${policyArn} has no default version`);
    }

    const { PolicyVersion: version } = await this.iamClient
      .getPolicyVersion({
        PolicyArn: policyArn,
        VersionId: policy.DefaultVersionId,
      })
      .promise();

    if (!version?.Document) {
      throw new Error(
        `Policy ${policyArn} version ${policy.DefaultVersionId} has no document`,
      );
    }

    return parsePolicyDocument(version.Document);
  }

  async extend(
    task: TaskReporter,
    target: TaskRolePolicyTarget,
    options: StepOptionsInterface,
  ): Promise<TaskRolePolicyOutcome> {
    task.output = `looking up ${target.policyName} on ${target.roleName}...`;
    const policyArn = await this.findAttachedPolicyArn(
      target.roleName,
      target.policyName,
    );

    if (!policyArn) {
      throw new Error(
        `Policy ${target.policyName} is not attached to role ${target.roleName}`,
      );
    }

    const current = await this.getDefaultDocument(policyArn);
    const updated = withAssumableResource(current, target.resourceArn);

    if (updated === current) {
      task.output = chalk.dim(
        `${target.resourceArn} is already allowed by ${target.policyName}`,
      );
      return { policyArn, changed: false, document: current };
    }

    if (options.dryRun) {
      task.output = chalk.dim(
        `would publish a new version of ${
          target.policyName
        }:\n${serializePolicyDocument(updated)}`,
      );
      return { policyArn, changed: false, document: updated };
    }

    await this.pruneOldestVersion(task, policyArn);

    task.output = `publishing a new version of ${target.policyName}...`;
    await this.iamClient
      .createPolicyVersion({
        PolicyArn: policyArn,
        PolicyDocument: JSON.stringify(updated),
        SetAsDefault: true,
      })
      .promise();

    return {
      policyArn,
      changed: true,
      document: await this.getDefaultDocument(policyArn),
    };
  }

  private async pruneOldestVersion(
    task: TaskReporter,
    policyArn: string,
  ): Promise<void> {
    const { Versions: versions = [] } = await this.iamClient
      .listPolicyVersions({ PolicyArn: policyArn })
      .promise();

    if (versions.length < MAX_POLICY_VERSIONS) {
      return;
    }

    const [oldest] = versions
      .filter(version => !version.IsDefaultVersion && version.VersionId)
      .sort(
        (a, b) =>
          (a.CreateDate ? a.CreateDate.getTime() : 0) -
          (b.CreateDate ? b.CreateDate.getTime() : 0),
      );

    if (!oldest?.VersionId) {
      return;
    }

    task.output = `deleting policy version ${oldest.VersionId} to make room...`;
    await this.iamClient
      .deletePolicyVersion({ PolicyArn: policyArn, VersionId: oldest.VersionId })
      .promise();
  }
}
