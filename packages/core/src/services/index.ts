export {
  type ChatClient,
  type ChatRole,
  type ChatTurn,
  LangChainChatClient,
  createChatClient,
  extractTextFromResponse,
  toMessages,
} from "./chatClient.js";

export { searchPubMed, type PubMedSearchParams } from "./pubmedService.js";

export {
  buildTrialSearchParams,
  searchTrials,
  type TrialSearchFilters,
} from "./clinicalTrialsService.js";

export {
  getAssociatedDiseases,
  getSafetyLiability,
  getTractability,
  type DiseaseAssociation,
  type SafetyLiability,
  type Tractability,
} from "./openTargetsService.js";

export { UmlsService } from "./umlsService.js";
