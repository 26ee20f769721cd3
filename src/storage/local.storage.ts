import { appendFileSync, readFileSync } from 'fs';

import { StorageInterface } from '../interfaces/storage.interface';

export class LocalStorage implements StorageInterface {
  static protocol = 'file:';

  getProtocol(): string {
    return LocalStorage.protocol;
  }

  async read(uri: string): Promise<string> {
    return readFileSync(LocalStorage.getPath(uri)).toString('utf-8');
  }

  async append(uri: string, content: string): Promise<void> {
    appendFileSync(LocalStorage.getPath(uri), content, 'utf-8');
  }

  private static getPath(uri: string): string {
    return uri.replace(/^file:\/\//gi, '');
  }
}
