export * from './schemas/message.js';
