import AWS from 'aws-sdk';

import { TaskReporter } from '../interfaces/task-reporter.interface';
import { hasErrorCode } from '../aws-errors';
import { PollOutcome, PollSettings, pollUntil } from '../poll';

// Peering connections never leave these states.
export const PEERING_DEAD_STATES: readonly string[] = [
  'failed',
  'rejected',
  'expired',
  'deleted',
];

export async function describePeeringStatus(
  ec2Client: AWS.EC2,
  peeringConnectionId: string,
): Promise<string> {
  try {
    const result = await ec2Client
      .describeVpcPeeringConnections({
        VpcPeeringConnectionIds: [peeringConnectionId],
      })
      .promise();
    const [connection] = result.VpcPeeringConnections || [];

    return connection?.Status?.Code || '';
  } catch (error) {
    // A freshly created connection can take a moment to become visible.
    if (hasErrorCode(error, 'InvalidVpcPeeringConnectionID.NotFound')) {
      return '';
    }

    throw error;
  }
}

export function waitForPeeringActive(
  ec2Client: AWS.EC2,
  task: TaskReporter,
  peeringConnectionId: string,
  settings: PollSettings,
): Promise<PollOutcome<string>> {
  task.output = `waiting for ${peeringConnectionId} to become active...`;

  return pollUntil({
    ...settings,
    check: () => describePeeringStatus(ec2Client, peeringConnectionId),
    isSucceeded: status => status === 'active',
    isFailed: status => PEERING_DEAD_STATES.includes(status),
    onPending: (status, attempt) => {
      task.output = `attempt ${attempt}${
        settings.maxAttempts ? ` of ${settings.maxAttempts}` : ''
      }: ${peeringConnectionId} is "${status || 'unknown'}", waiting...`;
    },
  });
}
