export { ChatService, type ChatServiceOptions, type ChatHistoryEntry } from './chat-service.js';
