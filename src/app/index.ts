export * from './app.controller';
export * from './app.module';
export * from './app.setup';
