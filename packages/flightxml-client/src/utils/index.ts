export * from './timestamps';
export * from './query';
