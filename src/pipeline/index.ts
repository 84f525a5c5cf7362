export { RequestPipeline } from './pipeline.js';
export { ResponseTranslator } from './translator.js';
export type { TranslatorConfig } from './translator.js';
