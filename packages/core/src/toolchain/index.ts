export { ToolchainProvisioner, computeFingerprint } from './toolchain-provisioner.js';
export type { ToolchainProvisionerOptions } from './toolchain-provisioner.js';
