import AWS from 'aws-sdk';
import chalk from 'chalk';
import figures from 'figures';
import URLParse from 'url-parse';

import { StorageInterface } from '../interfaces/storage.interface';
import { describeError, hasErrorCode } from '../aws-errors';

/**
 * S3 has no append; `append` rewrites the object with the new block added
 * at the end.
 */
export class S3Storage implements StorageInterface {
  static protocol = 's3:';

  constructor(private readonly s3Client: AWS.S3 = new AWS.S3()) {}

  getProtocol(): string {
    return S3Storage.protocol;
  }

  async read(uri: string): Promise<string> {
    const { bucket, key } = S3Storage.parseUri(uri);

    const response = await this.s3Client
      .getObject({
        Bucket: bucket,
        Key: key,
      })
      .promise();

    if (Buffer.isBuffer(response.Body)) {
      return response.Body.toString('utf-8');
    }

    if (typeof response.Body === 'string') {
      return response.Body;
    }

    throw new Error(
      `${chalk.red(
        figures.cross,
      )} error: could not read content of ${chalk.yellow(uri)}`,
    );
  }

  async append(uri: string, content: string): Promise<void> {
    const { bucket, key } = S3Storage.parseUri(uri);
    const existing = (await this.objectExists(bucket, key))
      ? await this.read(uri)
      : '';

    try {
      await this.s3Client
        .putObject({
          Bucket: bucket,
          Key: key,
          Body: `${existing}${content}`,
        })
        .promise();
    } catch (error) {
      throw new Error(
        `${chalk.red(figures.cross)} could not write to ${chalk.yellow(
          uri,
        )}: ${chalk.red(describeError(error))}`,
      );
    }
  }

  private async objectExists(bucket: string, key: string): Promise<boolean> {
    try {
      await this.s3Client
        .headObject({
          Bucket: bucket,
          Key: key,
        })
        .promise();
      return true;
    } catch (error) {
      if (!hasErrorCode(error, 'NotFound')) {
        throw error;
      }
    }

    return false;
  }

  private static parseUri(uri: string): { bucket: string; key: string } {
    const result = new URLParse(uri);

    if (!result.host || !result.pathname || result.pathname === '/') {
      throw new Error(
        `${chalk.red(figures.cross)} s3 path (${chalk.yellow(
          uri,
        )}) is not valid, path must be like: s3://bucket_name/my_dir/object_path.json`,
      );
    }

    return { bucket: result.host, key: result.pathname.substring(1) };
  }
}
