import { z } from 'zod';

export const POLICY_VERSION = '2012-10-17';

export const ASSUME_ROLE_ACTION = 'sts:AssumeRole';

const stringOrList = z.union([z.string(), z.array(z.string())]);

// Unknown keys pass through so that rewriting a document keeps every
// statement it already had as it was.
export const policyStatementSchema = z
  .object({
    Sid: z.string().optional(),
    Effect: z.string(),
    Principal: z.union([z.literal('*'), z.record(stringOrList)]).optional(),
    Action: stringOrList.optional(),
    Resource: stringOrList.optional(),
    Condition: z.record(z.record(z.unknown())).optional(),
  })
  .passthrough();

export const policyDocumentSchema = z
  .object({
    Version: z.string().optional(),
    Statement: z
      .union([policyStatementSchema, z.array(policyStatementSchema)])
      .transform(statement =>
        Array.isArray(statement) ? statement : [statement],
      ),
  })
  .passthrough();

export type PolicyStatement = z.output<typeof policyStatementSchema>;
export type PolicyDocument = z.output<typeof policyDocumentSchema>;

const asList = (value: string | string[] | undefined): string[] => {
  if (value === undefined) {
    return [];
  }

  return Array.isArray(value) ? value : [value];
};

/**
 * Parses a policy document as IAM returns it. Documents on roles and policy
 * versions come back URL-encoded.
 */
export const parsePolicyDocument = (raw: string): PolicyDocument => {
  const json = raw.trim().startsWith('{') ? raw : decodeURIComponent(raw);

  return policyDocumentSchema.parse(JSON.parse(json));
};

export const serializePolicyDocument = (document: PolicyDocument): string =>
  JSON.stringify(document, null, 2);

export const awsPrincipals = (statement: PolicyStatement): string[] =>
  statement.Principal === undefined || statement.Principal === '*'
    ? []
    : asList(statement.Principal.AWS);

/** True when the statement is about `principalArn` and nobody else. */
export const isSolePrincipal = (
  statement: PolicyStatement,
  principalArn: string,
): boolean => {
  const principals = awsPrincipals(statement);

  return principals.length === 1 && principals[0] === principalArn;
};

export const assumeRoleStatement = (principalArn: string): PolicyStatement => ({
  Effect: 'Allow',
  Principal: { AWS: principalArn },
  Action: ASSUME_ROLE_ACTION,
});

/**
 * Replaces any statement for `principalArn` with a single fresh
 * `sts:AssumeRole` grant. Other statements keep their content and order.
 */
export const withAssumeRolePrincipal = (
  document: PolicyDocument,
  principalArn: string,
): PolicyDocument => ({
  ...document,
  Statement: [
    ...document.Statement.filter(
      statement => !isSolePrincipal(statement, principalArn),
    ),
    assumeRoleStatement(principalArn),
  ],
});

/**
 * Adds `resourceArn` to the resources of the first statement that allows
 * `sts:AssumeRole`.
 */
export const withAssumableResource = (
  document: PolicyDocument,
  resourceArn: string,
): PolicyDocument => {
  const index = document.Statement.findIndex(statement =>
    asList(statement.Action).includes(ASSUME_ROLE_ACTION),
  );

  if (index === -1) {
    throw new Error(
      `Policy has no statement allowing ${ASSUME_ROLE_ACTION} to extend`,
    );
  }

  const target = document.Statement[index];
  const resources = asList(target.Resource);

  if (resources.includes(resourceArn)) {
    return document;
  }

  return {
    ...document,
    Statement: document.Statement.map((statement, position) =>
      position === index
        ? { ...statement, Resource: [...resources, resourceArn] }
        : statement,
    ),
  };
};
