import AWS from 'aws-sdk';
import chalk from 'chalk';

import { AuditLog } from '../audit/audit-log';
import { PeeringCreation } from '../config/onboarding-config';
import { TaskReporter } from '../interfaces/task-reporter.interface';
import { StepOptionsInterface } from '../interfaces/step-options.interface';
import { PollSettings } from '../poll';

import { RouteTableUpdater } from './route-table.updater';
import {
  IngressRuleResult,
  SecurityGroupRuleUpdater,
  ingressSources,
} from './security-group-rule.updater';
import { waitForPeeringActive } from './peering-connection.waiter';

export type PeeringRequestOutcome =
  | {
      status: 'completed';
      peeringConnectionId: string;
      routeTableIds: string[];
      rules: IngressRuleResult[];
    }
  | { status: 'skipped'; reason: string };

export const PEERING_PURPOSE_TAG = 'database-iam-jit';

/**
 * Requester side of a peering: asks the accepter account for a connection,
 * waits for it to be accepted, then routes and opens the database ports
 * towards the accepter CIDR.
 */
export class PeeringConnectionRequester {
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
    creation: PeeringCreation,
    options: StepOptionsInterface,
  ): Promise<PeeringRequestOutcome> {
    if (options.signal?.aborted) {
      return PeeringConnectionRequester.skip(task, 'interrupted');
    }

    const missing = (
      [
        ['requester_vpc_id', creation.requesterVpcId],
        ['accepter_account_id', creation.accepterAccountId],
        ['accepter_vpc_id', creation.accepterVpcId],
        ['accepter_region', creation.accepterRegion],
        ['accepter_cidr', creation.accepterCidr],
      ] as const
    )
      .filter(([, value]) => !value)
      .map(([field]) => field);

    if (missing.length > 0) {
      return PeeringConnectionRequester.skip(
        task,
        `missing ${missing.join(', ')}`,
      );
    }

    if (options.dryRun) {
      return PeeringConnectionRequester.skip(
        task,
        `would request peering from ${creation.requesterVpcId} to ${creation.accepterVpcId} (${creation.accepterAccountId}, ${creation.accepterRegion})`,
      );
    }

    task.output = `requesting peering from ${creation.requesterVpcId} to ${creation.accepterVpcId}...`;
    const result = await this.ec2Client
      .createVpcPeeringConnection({
        VpcId: creation.requesterVpcId,
        PeerOwnerId: creation.accepterAccountId,
        PeerVpcId: creation.accepterVpcId,
        PeerRegion: creation.accepterRegion,
        TagSpecifications: [
          {
            ResourceType: 'vpc-peering-connection',
            Tags: [
              { Key: 'Name', Value: `${creation.peeringName}-peering` },
              { Key: 'Purpose', Value: PEERING_PURPOSE_TAG },
            ],
          },
        ],
      })
      .promise();
    const peeringConnectionId =
      result.VpcPeeringConnection?.VpcPeeringConnectionId;

    if (!peeringConnectionId) {
      throw new Error(
        `Unexpected response, no peering connection id returned for ${creation.requesterVpcId}`,
      );
    }

    const outcome = await waitForPeeringActive(
      this.ec2Client,
      task,
      peeringConnectionId,
      { ...this.pollSettings, signal: options.signal },
    );

    if (outcome.state !== 'succeeded') {
      throw new Error(
        outcome.state === 'failed'
          ? `peering connection ${peeringConnectionId} is "${outcome.value}"`
          : `peering connection ${peeringConnectionId} was not accepted after ${outcome.attempts} checks`,
      );
    }

    const routes = await this.routeTableUpdater.addPeeringRoutes(
      task,
      {
        vpcId: creation.requesterVpcId,
        destinationCidr: creation.accepterCidr,
        peeringConnectionId,
      },
      options,
    );

    const rules = creation.ecsSecurityGroupId
      ? await this.securityGroupRuleUpdater.authorizeDatabasePorts(
          task,
          creation.ecsSecurityGroupId,
          ingressSources(creation.accepterCidr),
          options,
        )
      : [];

    await this.auditLog.record(
      `Peering Details for ${creation.peeringName}:`,
      [
        ['Peering ID', peeringConnectionId],
        ['Requester VPC', creation.requesterVpcId],
        ['Accepter VPC', creation.accepterVpcId],
        ['Accepter CIDR', creation.accepterCidr],
      ],
    );

    task.output = `${peeringConnectionId} is active`;

    return {
      status: 'completed',
      peeringConnectionId,
      routeTableIds:
        routes.status === 'updated' ? routes.routeTableIds : [],
      rules,
    };
  }

  private static skip(
    task: TaskReporter,
    reason: string,
  ): PeeringRequestOutcome {
    task.skip(chalk.dim(`skipped, ${reason}`));

    return { status: 'skipped', reason };
  }
}
