export const GCS_CLIENT = Symbol('GCS_CLIENT');
