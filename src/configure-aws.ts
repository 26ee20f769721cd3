import AWS from 'aws-sdk';

export type CredentialSource =
  | { kind: 'environment' }
  | { kind: 'profile'; profile: string };

export interface AwsSession {
  config: AWS.Config;
  credentialSource: CredentialSource;
}

/**
 * Resolves credentials from `AWS_*` environment variables first, then from
 * the named profile of the shared credentials file, and makes them the
 * global SDK configuration. The returned source names the provider that
 * resolved.
 */
export const configureAWS = async (
  profile: string,
  region: string,
): Promise<AwsSession> => {
  // The chain stops at the first provider that resolves, so the last one
  // tried is the one in use.
  const tried: CredentialSource[] = [];
  const credentials = await new AWS.CredentialProviderChain([
    () => {
      tried.push({ kind: 'environment' });
      return new AWS.EnvironmentCredentials('AWS');
    },
    () => {
      tried.push({ kind: 'profile', profile });
      return new AWS.SharedIniFileCredentials({ profile });
    },
  ]).resolvePromise();

  AWS.config.update({ region, credentials });

  return {
    config: AWS.config,
    credentialSource: tried[tried.length - 1] ?? { kind: 'profile', profile },
  };
};

export const describeCredentialSource = (source: CredentialSource): string =>
  source.kind === 'environment'
    ? 'environment variables'
    : `profile ${source.profile}`;
