export { SyncEngine } from './engine.js';
