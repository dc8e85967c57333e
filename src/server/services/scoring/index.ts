/**
 * Scoring Layer - Main exports
 */

// Main service
export { CredibilityScorer, DEFAULT_CREDIBILITY_CONFIG } from './CredibilityScorer.js';
export type { CredibilityScorerConfig } from './CredibilityScorer.js';

// Reputation tables
export { StaticReputationTable, FileReputationTable } from './ReputationTable.js';

// Interfaces
export type { ICredibilityScorer, ScorableDocument } from './interfaces/ICredibilityScorer.js';
export type { IReputationTable } from './interfaces/IReputationTable.js';
