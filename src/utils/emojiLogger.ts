/**
 * Logger with emoji prefixes for pipeline stage messages
 */
import { logger } from './logger';

/**
 * Emoji number representation for better progress visualization
 */
const numberEmojis = ['0️⃣', '1️⃣', '2️⃣', '3️⃣', '4️⃣', '5️⃣', '6️⃣', '7️⃣', '8️⃣', '9️⃣'];

/**
 * Convert a number to emoji representation for better visual tracking
 */
export const getNumberEmoji = (num: number): string => {
  return String(num)
    .split('')
    .map(digit => numberEmojis[Number(digit)])
    .join('');
};

export const emojiLogger = {
  info: (message: string, data?: unknown) => {
    logger.info(`🔍 ${message}`, data);
  },

  success: (message: string, data?: unknown) => {
    logger.info(`✅ ${message}`, data);
  },

  warn: (message: string, data?: unknown) => {
    logger.warn(`⚠️ ${message}`, data);
  },

  error: (message: string, data?: unknown) => {
    logger.error(`❌ ${message}`, data);
  },

  parse: (message: string, data?: unknown) => {
    logger.info(`📝 PARSE: ${message}`, data);
  },

  enhance: (message: string, data?: unknown) => {
    logger.info(`🖼️ ENHANCE: ${message}`, data);
  },

  extract: (message: string, data?: unknown) => {
    logger.info(`📊 EXTRACT: ${message}`, data);
  },

  pipeline: (message: string, data?: unknown) => {
    logger.info(`🔄 PIPELINE: ${message}`, data);
  },

  api: (message: string, data?: unknown) => {
    logger.info(`🌐 API: ${message}`, data);
  },

  time: (message: string, timeMs: number) => {
    logger.info(`⏱️ TIME: ${message} - ${timeMs.toFixed(2)}ms`);
  },

  progress: (current: number, total: number, message: string) => {
    logger.info(`${getNumberEmoji(current)} of ${getNumberEmoji(total)} ${message}`);
  },
};

export default emojiLogger;
