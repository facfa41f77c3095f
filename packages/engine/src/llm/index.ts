export { ChatClient, loadChatClientConfig, type ChatClientConfig, type ChatMessage } from "./chat-client";
export { ChatContractGenerator, extractContractCode, type ContractGenerator } from "./generator";
export { ChatReportTranslator, parseTranslation, translateReport, type ReportTranslator } from "./translator";
