export interface StorageInterface {
  getProtocol(): string;
  read(uri: string): Promise<string>;
  append(uri: string, content: string): Promise<void>;
}
