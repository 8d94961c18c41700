/**
 * @tsforge/core - Core utilities for the forecasting toolkit
 *
 * This module provides the foundations shared across packages:
 * - Telemetry: structured JSON logger
 * - Time series: input representations and the canonical series container
 */

// Telemetry exports
export * from './telemetry/index.js';

// Time-series exports
export * from './time-series/index.js';
