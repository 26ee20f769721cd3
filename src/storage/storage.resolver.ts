import URLParse from 'url-parse';

import { AuditLog } from '../audit/audit-log';
import { StorageInterface } from '../interfaces/storage.interface';

import { LocalStorage } from './local.storage';
import { S3Storage } from './s3.storage';

/**
 * Maps config and audit locations to a storage. Plain paths and `file://`
 * URIs are local, `s3://bucket/key` is S3.
 */
export class StorageResolver {
  constructor(private readonly storages: StorageInterface[]) {}

  public static initialize(): StorageResolver {
    return new StorageResolver([new LocalStorage(), new S3Storage()]);
  }

  resolveByUri(uri: string): StorageInterface {
    const protocol =
      URLParse.extractProtocol(uri).protocol || LocalStorage.protocol;
    const storage = this.storages.find(
      candidate => candidate.getProtocol() === protocol,
    );

    if (!storage) {
      throw new Error(
        `storage protocol ${protocol} of ${uri} is not supported, use a local path or ${this.storages
          .map(candidate => `${candidate.getProtocol()}//`)
          .join(', ')}`,
      );
    }

    return storage;
  }

  read(uri: string): Promise<string> {
    return this.resolveByUri(uri).read(uri);
  }

  openAuditLog(uri: string): AuditLog {
    return new AuditLog(this.resolveByUri(uri), uri);
  }
}
