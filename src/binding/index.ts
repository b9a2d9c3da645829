export type { Install } from './installer';
export { createInstaller } from './installer';
