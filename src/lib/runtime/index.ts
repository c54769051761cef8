export { NetworkInitializer } from './network-initializer';
