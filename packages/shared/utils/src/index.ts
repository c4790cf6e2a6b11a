// Shared utilities for Crewroom

export {
  ConsoleLogger,
  createLogger,
  isLogLevel,
  silentLogger,
  type Logger,
  type LogLevel,
} from './logger.js';

export { parseMentions, removeMention, isMentioned } from './mentions.js';
