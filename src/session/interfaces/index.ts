export * from './session-state.interface';
