export * from './interfaces';
export * from './storage.constants';
export * from './storage.module';
export * from './storage.service';
