export * from './address-codec';
export * from './address-resolver';
export { CandidateAddressList } from './candidate-list';
