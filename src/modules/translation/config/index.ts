export { openaiConfig } from './openai.config';
export { promptsConfig } from './prompts.config';
