export { MemoryStateProvider } from './persistence';
