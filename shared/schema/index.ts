export * from './analyses';
