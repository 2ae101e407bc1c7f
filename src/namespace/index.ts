export { NamespaceManager, type NamespaceHandle, type NamespaceManagerOptions } from './manager.js';
