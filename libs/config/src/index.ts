export * from './app/config.module';
export * from './app/config.service';
export * from './gcp/config.module';
export * from './gcp/config.service';
export * from './session/config.module';
export * from './session/config.service';
export * from './upload/config.module';
export * from './upload/config.service';
export { DEFAULT_UPLOAD_MAX_BYTES } from './upload/configuration';
