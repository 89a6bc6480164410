/**
 * Jest setup: quiet logging and decorator metadata before any module loads
 */
import 'reflect-metadata';

process.env.LOG_LEVEL = 'fatal';
