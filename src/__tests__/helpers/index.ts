export { createCommit, identity, resetCommitCounter, shuffled } from './factories';
