/**
 * Centralized model configuration for the review call.
 * Single source of truth for model names across the application.
 */

// Model names as constants
export const MODEL_NAMES = {
  REVIEW_DEFAULT: "qwen-turbo",
} as const;

// Default models (with environment variable overrides)
export const DEFAULT_MODELS = {
  REVIEW: process.env.DEFAULT_REVIEW_MODEL || MODEL_NAMES.REVIEW_DEFAULT,
} as const;

// System prompt of the review call
export const REVIEW_SYSTEM_PROMPT =
  "You are a strict reviewer of research reports. Judge only against the reference text you are given.";
