import AWS from 'aws-sdk';
import chalk from 'chalk';

import { TaskReporter } from '../interfaces/task-reporter.interface';
import { StepOptionsInterface } from '../interfaces/step-options.interface';
import { hasErrorCode } from '../aws-errors';

export type PeeringRoute = {
  vpcId: string;
  destinationCidr: string;
  peeringConnectionId: string;
};

export type RouteUpdateResult =
  | { status: 'no-route-tables' }
  | {
      status: 'updated';
      routeTableIds: string[];
      created: string[];
      alreadyPresent: string[];
    };

export class RouteTableUpdater {
  constructor(private readonly ec2Client: AWS.EC2 = new AWS.EC2()) {}

  async listRouteTableIds(vpcId: string): Promise<string[]> {
    const routeTableIds: string[] = [];
    let nextToken: string | undefined;

    do {
      const result = await this.ec2Client
        .describeRouteTables({
          Filters: [{ Name: 'vpc-id', Values: [vpcId] }],
          NextToken: nextToken,
        })
        .promise();

      for (const routeTable of result.RouteTables || []) {
        if (routeTable.RouteTableId) {
          routeTableIds.push(routeTable.RouteTableId);
        }
      }

      nextToken = result.NextToken;
    } while (nextToken);

    return routeTableIds;
  }

  /**
   * Routes `destinationCidr` through the peering connection in every route
   * table of the VPC. Existing routes are left as they are.
   */
  async addPeeringRoutes(
    task: TaskReporter,
    route: PeeringRoute,
    options: StepOptionsInterface,
  ): Promise<RouteUpdateResult> {
    task.output = `fetching route tables of ${route.vpcId}...`;
    const routeTableIds = await this.listRouteTableIds(route.vpcId);

    if (routeTableIds.length === 0) {
      task.output = `no route tables found for ${route.vpcId}`;
      return { status: 'no-route-tables' };
    }

    const created: string[] = [];
    const alreadyPresent: string[] = [];

    for (const routeTableId of routeTableIds) {
      if (options.dryRun) {
        task.output = chalk.dim(
          `would route ${route.destinationCidr} via ${route.peeringConnectionId} in ${routeTableId}`,
        );
        continue;
      }

      task.output = `adding route to ${routeTableId}...`;

      try {
        await this.ec2Client
          .createRoute({
            RouteTableId: routeTableId,
            DestinationCidrBlock: route.destinationCidr,
            VpcPeeringConnectionId: route.peeringConnectionId,
          })
          .promise();
        created.push(routeTableId);
      } catch (error) {
        if (!hasErrorCode(error, 'RouteAlreadyExists')) {
          throw error;
        }

        task.output = chalk.dim(
          `route to ${route.destinationCidr} already exists in ${routeTableId}`,
        );
        alreadyPresent.push(routeTableId);
      }
    }

    return { status: 'updated', routeTableIds, created, alreadyPresent };
  }
}
