export type { ContractConfig, ContractDeployment, PublishedContractRef } from './contract.js';
export { Contract, publishContracts } from './contract.js';

export type { CallOptions, CallerConfig } from './caller.js';
export { Caller, randomAmount, MIN_RANDOM_AMOUNT, MAX_RANDOM_AMOUNT } from './caller.js';

export type { CallOutcome } from './call-result.js';
export { CallResult } from './call-result.js';

export type { ArtifactVariant } from './artifact.js';
export { writeContractArtifact, renderContractSource, ARTIFACT_FILE_NAME } from './artifact.js';
