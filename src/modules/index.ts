/**
 * NestJS integration
 */

export * from './tracking';
