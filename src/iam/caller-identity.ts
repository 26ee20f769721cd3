import AWS from 'aws-sdk';

export const isAccountId = (value: string): boolean => /^\d{12}$/.test(value);

export async function getCallerAccountId(
  stsClient: AWS.STS = new AWS.STS(),
): Promise<string> {
  const { Account: account } = await stsClient
    .getCallerIdentity({})
    .promise();

  if (!account) {
    throw new Error('Could not resolve the AWS account of the caller');
  }

  return account;
}
