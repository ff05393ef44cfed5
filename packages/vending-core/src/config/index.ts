export {
  MachineConfigSchema,
  DEFAULT_MACHINE_ID,
  type MachineConfig,
  type MachineConfigInput,
} from "./schema.js";
export {
  loadMachineConfig,
  parseMachineConfig,
  resolveEnvVars,
  LOG_LEVEL_ENV_VAR,
  type LoadConfigOptions,
} from "./loader.js";
