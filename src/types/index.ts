// Re-export provider types (LLMProvider, ChatMessage, etc.)
export * from './provider.js';

// Re-export scaffold types (RoleSettings, ReplyAction, TranscriptEntry, etc.)
export * from './scaffold.js';

// Re-export task and output types (TaskExample, OutputRecord, etc.)
export * from './task.js';
