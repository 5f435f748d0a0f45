export { loadConfig } from './config';
export type { Config } from './config';
export { createPipeline } from './pipeline';
export type { Pipeline, PipelineOverrides } from './pipeline';
export * from './types';
export * from './kiwoom';
export * from './data';
export * from './utils';
