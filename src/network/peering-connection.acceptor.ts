import AWS from 'aws-sdk';
import chalk from 'chalk';

import { AuditLog } from '../audit/audit-log';
import { PeeringRequest } from '../config/onboarding-config';
import { TaskReporter } from '../interfaces/task-reporter.interface';
import { StepOptionsInterface } from '../interfaces/step-options.interface';
import { describeError, hasErrorCode } from '../aws-errors';
import { PollSettings } from '../poll';

import { RouteTableUpdater } from './route-table.updater';
import {
  IngressRuleResult,
  SecurityGroupRuleUpdater,
  ingressSources,
} from './security-group-rule.updater';
import { waitForPeeringActive } from './peering-connection.waiter';

export type PeeringAcceptOutcome =
  | {
      status: 'completed';
      routeTableIds: string[];
      rules: IngressRuleResult[];
    }
  | { status: 'skipped'; reason: string };

// Acceptance errors that mean "nothing to accept here", as opposed to a
// broken request or missing permissions.
const SKIPPABLE_ACCEPT_ERRORS = [
  'InvalidStateTransition',
  'InvalidVpcPeeringConnectionID.NotFound',
  'InvalidVpcPeeringConnectionId.Malformed',
  'OperationNotPermitted',
];

export class PeeringConnectionAcceptor {
  static auditHeading = 'Accepted Peering Details:';

  constructor(
    private readonly auditLog: AuditLog,
    private readonly pollSettings: PollSettings,
    private readonly ec2Client: AWS.EC2 = new AWS.EC2(),
    private readonly routeTableUpdater = new RouteTableUpdater(ec2Client),
    private readonly securityGroupRuleUpdater = new SecurityGroupRuleUpdater(
      ec2Client,
    ),
  ) {}

  async process(
    task: TaskReporter,
    request: PeeringRequest,
    options: StepOptionsInterface,
  ): Promise<PeeringAcceptOutcome> {
    const peeringId = request.requesterPeeringId;

    if (options.signal?.aborted) {
      return PeeringConnectionAcceptor.skip(task, 'interrupted');
    }

    if (!peeringId || !request.accepterVpcId || !request.requesterCidr) {
      return PeeringConnectionAcceptor.skip(
        task,
        'requester_peering_id, accepter_vpc_id and requester_cidr are required',
      );
    }

    if (options.dryRun) {
      task.output = chalk.dim(`would accept ${peeringId}`);
    } else {
      const skipReason = await this.acceptAndWait(task, peeringId, options);

      if (skipReason) {
        return PeeringConnectionAcceptor.skip(task, skipReason);
      }
    }

    const routes = await this.routeTableUpdater.addPeeringRoutes(
      task,
      {
        vpcId: request.accepterVpcId,
        destinationCidr: request.requesterCidr,
        peeringConnectionId: peeringId,
      },
      options,
    );

    if (routes.status === 'no-route-tables') {
      return PeeringConnectionAcceptor.skip(
        task,
        `no route tables found for ${request.accepterVpcId}`,
      );
    }

    const rules: IngressRuleResult[] = [];
    const sources = ingressSources(
      request.requesterCidr,
      request.requesterNatGatewayIp,
    );

    for (const groupId of request.rdsSecurityGroups) {
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
      await this.auditLog.record(PeeringConnectionAcceptor.auditHeading, [
        ['Peering ID', peeringId],
        ['VPC ID', request.accepterVpcId],
        ['Requester CIDR', request.requesterCidr],
        ['Requester NAT Gateway IP', request.requesterNatGatewayIp],
      ]);
    }

    task.output = `routed ${routes.routeTableIds.length} route table(s), ${rules.length} ingress rule(s) checked`;

    return { status: 'completed', routeTableIds: routes.routeTableIds, rules };
  }

  /**
   * Returns why the entry has to be skipped, or undefined once the
   * connection is active.
   */
  private async acceptAndWait(
    task: TaskReporter,
    peeringId: string,
    options: StepOptionsInterface,
  ): Promise<string | undefined> {
    task.output = `accepting ${peeringId}...`;

    try {
      await this.ec2Client
        .acceptVpcPeeringConnection({ VpcPeeringConnectionId: peeringId })
        .promise();
    } catch (error) {
      if (!hasErrorCode(error, ...SKIPPABLE_ACCEPT_ERRORS)) {
        throw error;
      }

      return `could not accept ${peeringId}, it may be in an invalid state (${describeError(
        error,
      )})`;
    }

    const outcome = await waitForPeeringActive(
      this.ec2Client,
      task,
      peeringId,
      { ...this.pollSettings, signal: options.signal },
    );

    if (outcome.state === 'failed') {
      return `peering connection ${peeringId} is "${outcome.value}"`;
    }

    if (outcome.state === 'timed-out') {
      return `timed out after ${outcome.attempts} checks waiting for ${peeringId} to become active`;
    }

    return undefined;
  }

  private static skip(
    task: TaskReporter,
    reason: string,
  ): PeeringAcceptOutcome {
    task.skip(chalk.dim(`skipped, ${reason}`));

    return { status: 'skipped', reason };
  }
}
