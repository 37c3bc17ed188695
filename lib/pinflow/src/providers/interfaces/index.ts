export type { IPersistenceProvider } from './persistence';
