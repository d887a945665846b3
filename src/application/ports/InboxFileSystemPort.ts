export interface InboxFileSystemPort {
  ensureLayout(): Promise<void>;
  listInbox(): Promise<string[]>;
  readInboxFile(filename: string): Promise<string>;
  hasMarker(filename: string): Promise<boolean>;
  touchMarker(filename: string): Promise<void>;
  writeProcessed(filename: string, content: string): Promise<void>;
  removeProcessed(filename: string): Promise<void>;
  moveToProcessed(filename: string, targetName: string): Promise<void>;
  moveToFailed(filename: string): Promise<void>;
}
