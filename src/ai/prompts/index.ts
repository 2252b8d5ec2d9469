export * from './classify-intent.prompt';
export * from './generate-answer.prompt';
