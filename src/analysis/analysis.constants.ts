export const MODEL_CLIENT = Symbol('MODEL_CLIENT');

/** Label used for this service in LLM metrics. */
export const ANALYSIS_METRICS_SERVICE = 'brand_compatibility_analysis';
