export interface AwsErrorLike {
  code: string;
  message: string;
}

export const isAwsError = (error: unknown): error is AwsErrorLike =>
  typeof error === 'object' &&
  error !== null &&
  'code' in error &&
  typeof error.code === 'string';

export const hasErrorCode = (error: unknown, ...codes: string[]): boolean =>
  isAwsError(error) && codes.includes(error.code);

export const describeError = (error: unknown): string => {
  if (isAwsError(error)) {
    return error.message ? `${error.code}: ${error.message}` : error.code;
  }

  return error instanceof Error ? error.message : String(error);
};
