import chalk from 'chalk';

import { AuditLog, AuditField } from '../audit/audit-log';
import {
  PrivateRdsConfig,
  PublicRdsConfig,
} from '../config/onboarding-config';
import { TaskReporter } from '../interfaces/task-reporter.interface';
import { StepOptionsInterface } from '../interfaces/step-options.interface';

import {
  IngressRuleResult,
  IngressSource,
  SecurityGroupRuleUpdater,
  ingressSources,
} from './security-group-rule.updater';

export type RdsOnboardOutcome =
  | { status: 'completed'; rules: IngressRuleResult[] }
  | { status: 'skipped'; reason: string };

/**
 * Opens database ports on RDS security groups for a VPC that is already
 * peered. Private databases only see the VPC CIDR, public ones also the
 * requester's NAT gateway address.
 */
export class RdsSecurityGroupOnboarder {
  static privateAuditHeading = 'Private RDS Security Group Updates:';

  static publicAuditHeading = 'Public RDS Security Group Updates:';

  constructor(
    private readonly auditLog: AuditLog,
    private readonly securityGroupRuleUpdater = new SecurityGroupRuleUpdater(),
  ) {}

  onboardPrivate(
    task: TaskReporter,
    config: PrivateRdsConfig,
    options: StepOptionsInterface,
  ): Promise<RdsOnboardOutcome> {
    return this.onboard(
      task,
      config.requesterCidr,
      config.rdsSecurityGroups,
      ingressSources(config.requesterCidr),
      options,
      RdsSecurityGroupOnboarder.privateAuditHeading,
      [['Requester CIDR', config.requesterCidr]],
    );
  }

  onboardPublic(
    task: TaskReporter,
    config: PublicRdsConfig,
    options: StepOptionsInterface,
  ): Promise<RdsOnboardOutcome> {
    return this.onboard(
      task,
      config.requesterCidr,
      config.rdsSecurityGroups,
      ingressSources(config.requesterCidr, config.requesterNatGatewayIp),
      options,
      RdsSecurityGroupOnboarder.publicAuditHeading,
      [
        ['Requester CIDR', config.requesterCidr],
        ['Requester NAT Gateway IP', config.requesterNatGatewayIp],
      ],
    );
  }

  private async onboard(
    task: TaskReporter,
    requesterCidr: string,
    groupIds: string[],
    sources: IngressSource[],
    options: StepOptionsInterface,
    auditHeading: string,
    auditFields: AuditField[],
  ): Promise<RdsOnboardOutcome> {
    const reason = options.signal?.aborted
      ? 'interrupted'
      : !requesterCidr
      ? 'requester_cidr is required'
      : undefined;

    if (reason) {
      task.skip(chalk.dim(`skipped, ${reason}`));
      return { status: 'skipped', reason };
    }

    const rules: IngressRuleResult[] = [];

    for (const groupId of groupIds) {
      task.output = `updating RDS security group ${groupId}...`;
      rules.push(
        ...(await this.securityGroupRuleUpdater.authorizeDatabasePorts(
          task,
          groupId,
          sources,
          options,
        )),
      );
    }

    if (!options.dryRun) {
      await this.auditLog.record(auditHeading, [
        ...auditFields,
        ['Security Groups', groupIds.join(' ')],
      ]);
    }

    task.output =
      groupIds.length > 0
        ? `${rules.length} ingress rule(s) checked on ${groupIds.length} security group(s)`
        : 'no RDS security groups configured';

    return { status: 'completed', rules };
  }
}
