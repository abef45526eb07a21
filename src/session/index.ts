export * from './interfaces';
export * from './session.machine';
export * from './session.module';
export * from './session.service';
