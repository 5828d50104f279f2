export * from "./constants";
export * from "./errors";
export * from "./logger";

// Export auth-related functionality
export * from './auth/types';
export * from './auth/session';
export * from './auth/credentials';
export * from './auth/oauth';
export * from './auth/providers/fitbit';

// Export Fitbit API and TCX functionality
export * from './fitbit/types';
export * from './fitbit/client';
export * from './timeline';
