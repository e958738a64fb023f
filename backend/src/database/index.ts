export { OrderStore, type CancelOutcome } from "./orders.js";
export { ConversationStore } from "./conversations.js";
