export * from './object-storage-client.interface';
export * from './upload-record.interface';
