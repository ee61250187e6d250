// Action metadata types
export * from './metadata.types';

// Common types
export * from './common.types';

// Commit types
export * from './commit.types';

// Configuration types
export * from './config.types';

// Context and runtime types
export * from './context.types';

// GitHub related types
export * from './github.types';

// Release plan types
export * from './release-plan.types';

// Title validation types
export * from './title.types';

// Version types
export * from './version.types';
