export { listHostAddresses, getHostAddr } from './host-addresses';
