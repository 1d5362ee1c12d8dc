/**
 * Shared AI Module
 *
 * Fallback move selection and deterministic RNG helpers used by the engine's
 * agents and the protocol session.
 *
 * @module ai
 */

export {
  // Types
  type FallbackReason,
  type FallbackContext,
  type FallbackResult,
  // Functions
  selectFallbackMove,
  isAcceptableMove,
  createLocalAIRng,
  deriveFallbackSeed,
} from './AIFallbackHandler';
