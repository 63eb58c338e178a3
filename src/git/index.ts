/**
 * Git operations wrapper
 *
 * Shells out to the system git with argv arrays (no shell interpolation).
 * The store session is the only consumer; everything version-control
 * specific stays behind these helpers.
 */

// Core execution
export {
  gitExec,
  gitExecStdout,
  gitExecLines,
  type GitExecResult,
  type GitExecOptions,
} from './exec.js'

// Repository operations
export {
  initRepo,
  cloneRepo,
  getCurrentBranch,
  getDefaultBranch,
  getHead,
  getConfig,
  setConfig,
  addAll,
  addPathsForced,
  listChangedPaths,
  commit,
  pushHead,
  isPushRejection,
  type PushResult,
  type RepoCommandOptions,
} from './repo.js'
