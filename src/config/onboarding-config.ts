import { z } from 'zod';

// Missing or malformed scalar fields read as '' so that entries fall into
// the skip paths instead of failing the whole file.
const text = z.string().trim().catch('');

const securityGroupList = z
  .array(text)
  .catch([])
  .transform(ids => ids.filter(id => id.length > 0));

const entryList = <T extends z.ZodTypeAny>(entry: T) =>
  z
    .array(z.unknown())
    .catch([])
    .pipe(z.array(entry.optional().catch(undefined)));

const peeringRequestSchema = z
  .object({
    requester_peering_id: text,
    accepter_vpc_id: text,
    requester_cidr: text,
    requester_nat_gateway_ip: text,
    rds_security_groups: securityGroupList,
  })
  .transform(raw => ({
    requesterPeeringId: raw.requester_peering_id,
    accepterVpcId: raw.accepter_vpc_id,
    requesterCidr: raw.requester_cidr,
    requesterNatGatewayIp: raw.requester_nat_gateway_ip,
    rdsSecurityGroups: raw.rds_security_groups,
  }));

const privateRdsConfigSchema = z
  .object({
    requester_cidr: text,
    rds_security_groups: securityGroupList,
  })
  .transform(raw => ({
    requesterCidr: raw.requester_cidr,
    rdsSecurityGroups: raw.rds_security_groups,
  }));

const publicRdsConfigSchema = z
  .object({
    requester_cidr: text,
    requester_nat_gateway_ip: text,
    rds_security_groups: securityGroupList,
  })
  .transform(raw => ({
    requesterCidr: raw.requester_cidr,
    requesterNatGatewayIp: raw.requester_nat_gateway_ip,
    rdsSecurityGroups: raw.rds_security_groups,
  }));

const peeringCreationSchema = z
  .object({
    requester_vpc_id: text,
    accepter_account_id: text,
    accepter_vpc_id: text,
    accepter_region: text,
    peering_name: text,
    accepter_cidr: text,
    ecs_security_group_id: text,
  })
  .transform(raw => ({
    requesterVpcId: raw.requester_vpc_id,
    accepterAccountId: raw.accepter_account_id,
    accepterVpcId: raw.accepter_vpc_id,
    accepterRegion: raw.accepter_region,
    peeringName: raw.peering_name,
    accepterCidr: raw.accepter_cidr,
    ecsSecurityGroupId: raw.ecs_security_group_id,
  }));

export type PeeringRequest = z.output<typeof peeringRequestSchema>;
export type PrivateRdsConfig = z.output<typeof privateRdsConfigSchema>;
export type PublicRdsConfig = z.output<typeof publicRdsConfigSchema>;
export type PeeringCreation = z.output<typeof peeringCreationSchema>;

const withoutInvalid = <T>(entries: (T | undefined)[]): T[] =>
  entries.filter((entry): entry is T => entry !== undefined);

const accepterFileSchema = z
  .object({ vpc_peerings: entryList(peeringRequestSchema) })
  .transform(file => withoutInvalid(file.vpc_peerings));

const requesterFileSchema = z
  .object({ vpc_peerings: entryList(peeringCreationSchema) })
  .transform(file => withoutInvalid(file.vpc_peerings));

const privateRdsFileSchema = z
  .object({ private_rds_configs: entryList(privateRdsConfigSchema) })
  .transform(file => withoutInvalid(file.private_rds_configs));

const publicRdsFileSchema = z
  .object({ public_rds_configs: entryList(publicRdsConfigSchema) })
  .transform(file => withoutInvalid(file.public_rds_configs));

const parseJson = (content: string, source: string): unknown => {
  try {
    return JSON.parse(content);
  } catch (error) {
    throw new Error(
      `${source} is not valid JSON: ${
        error instanceof Error ? error.message : String(error)
      }`,
    );
  }
};

const parseWith = <T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  content: string,
  source: string,
): T => {
  const result = schema.safeParse(parseJson(content, source));

  if (!result.success) {
    throw new Error(
      `${source} must contain a JSON object: ${result.error.message}`,
    );
  }

  return result.data;
};

export const parsePeeringRequests = (
  content: string,
  source = 'config file',
): PeeringRequest[] => parseWith(accepterFileSchema, content, source);

export const parsePeeringCreations = (
  content: string,
  source = 'config file',
): PeeringCreation[] => parseWith(requesterFileSchema, content, source);

export const parsePrivateRdsConfigs = (
  content: string,
  source = 'config file',
): PrivateRdsConfig[] => parseWith(privateRdsFileSchema, content, source);

export const parsePublicRdsConfigs = (
  content: string,
  source = 'config file',
): PublicRdsConfig[] => parseWith(publicRdsFileSchema, content, source);
