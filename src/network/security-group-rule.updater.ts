import AWS from 'aws-sdk';
import chalk from 'chalk';

import { TaskReporter } from '../interfaces/task-reporter.interface';
import { StepOptionsInterface } from '../interfaces/step-options.interface';
import { hasErrorCode } from '../aws-errors';

export type DatabasePort = {
  port: number;
  engine: string;
};

export const DATABASE_PORTS: readonly DatabasePort[] = [
  { port: 3306, engine: 'MySQL' },
  { port: 5432, engine: 'PostgreSQL' },
];

export type IngressSource = {
  cidr: string;
  label: string;
};

export type IngressRuleResult = {
  groupId: string;
  port: number;
  cidr: string;
  status: 'authorized' | 'already-present' | 'planned';
};

export const toHostCidr = (ip: string): string => `${ip}/32`;

/**
 * Sources for a VPC CIDR plus, when known, the NAT gateway address its
 * traffic leaves through.
 */
export const ingressSources = (
  cidr: string,
  natGatewayIp?: string,
): IngressSource[] => {
  const sources: IngressSource[] = [];

  if (cidr) {
    sources.push({ cidr, label: 'CIDR' });
  }

  if (natGatewayIp) {
    sources.push({ cidr: toHostCidr(natGatewayIp), label: 'NAT Gateway IP' });
  }

  return sources;
};

export class SecurityGroupRuleUpdater {
  constructor(private readonly ec2Client: AWS.EC2 = new AWS.EC2()) {}

  /**
   * Opens every database port to every source, one call per pair. A rule
   * that already exists does not stop the remaining calls.
   */
  async authorizeDatabasePorts(
    task: TaskReporter,
    groupId: string,
    sources: IngressSource[],
    options: StepOptionsInterface,
  ): Promise<IngressRuleResult[]> {
    const results: IngressRuleResult[] = [];

    for (const { port, engine } of DATABASE_PORTS) {
      for (const source of sources) {
        if (options.dryRun) {
          task.output = chalk.dim(
            `would allow ${engine} (${port}) from ${source.cidr} on ${groupId}`,
          );
          results.push({ groupId, port, cidr: source.cidr, status: 'planned' });
          continue;
        }

        task.output = `allowing ${engine} (${port}) from ${source.label} ${source.cidr} on ${groupId}...`;
        const status = await this.authorize(groupId, port, source.cidr);
        results.push({ groupId, port, cidr: source.cidr, status });

        if (status === 'already-present') {
          task.output = chalk.dim(
            `${engine} ${source.label} rule already exists on ${groupId}`,
          );
        }
      }
    }

    return results;
  }

  private async authorize(
    groupId: string,
    port: number,
    cidr: string,
  ): Promise<'authorized' | 'already-present'> {
    try {
      await this.ec2Client
        .authorizeSecurityGroupIngress({
          GroupId: groupId,
          IpPermissions: [
            {
              IpProtocol: 'tcp',
              FromPort: port,
              ToPort: port,
              IpRanges: [{ CidrIp: cidr }],
            },
          ],
        })
        .promise();

      return 'authorized';
    } catch (error) {
      if (hasErrorCode(error, 'InvalidPermission.Duplicate')) {
        return 'already-present';
      }

      throw error;
    }
  }
}
