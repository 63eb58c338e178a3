/**
 * Workflows built on the store.
 */

export {
  publishArtifact,
  publishCommitMessage,
  type PublishOptions,
  type PublishProgress,
  type PublishResult,
  type PublishState,
} from './publish.js'
export { getArtifact, type GetOptions, type GetResult, type GetState } from './get.js'
export { backoffDelay, retryPolicy, sleep, type Sleep } from './retry.js'
