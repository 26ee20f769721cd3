import { StorageInterface } from '../interfaces/storage.interface';

export const AUDIT_SEPARATOR = '-'.repeat(40);

export type AuditField = [label: string, value: string];

export const formatAuditBlock = (
  heading: string,
  fields: AuditField[],
): string =>
  [
    heading,
    ...fields.map(([label, value]) => `${label}: ${value}`),
    AUDIT_SEPARATOR,
  ]
    .map(line => `${line}\n`)
    .join('');

/**
 * Append-only record of what a command changed, one block per entry.
 */
export class AuditLog {
  constructor(
    private readonly storage: StorageInterface,
    readonly uri: string,
  ) {}

  async record(heading: string, fields: AuditField[]): Promise<void> {
    await this.storage.append(this.uri, formatAuditBlock(heading, fields));
  }
}
