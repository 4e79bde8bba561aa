// Shared configuration: diagnostics flags resolved from overrides, env, then defaults.

export {
  resolveFlag,
  resolveFlags,
  setFlagOverride,
  clearFlagOverride,
  clearAllFlagOverrides,
  readOverrides,
  DEFAULT_FLAGS,
  FLAG_KEYS,
  ENV_PREFIX,
  type DiagramFlags,
  type DiagramFlagKey,
} from './flags'
