export {
  MODEL_CONFIG,
  MODEL_PROVIDERS,
  PROVIDER_CREDENTIALS,
  type ChatModelConfig,
  type ModelProvider,
} from "./models.js";
export {
  ENDPOINTS,
  HTTP_CONFIG,
  PUBMED_DEFAULTS,
  CLINICAL_TRIALS_DEFAULTS,
  TRIAL_STATUSES,
  OPEN_TARGETS_DEFAULTS,
  type TrialStatus,
} from "./settings.js";
export {
  assertProviderCredentials,
  createChatModel,
  resolveProviderApiKey,
} from "./modelFactory.js";
