export * from './brand-analysis.interface';
export * from './multimodal-model-client.interface';
