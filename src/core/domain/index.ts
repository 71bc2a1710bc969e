/**
 * File: src/core/domain/index.ts
 * Summary: Barrel exports for the timing and results domain model.
 */

export * from './classification';
export * from './competitor';
export * from './grid';
export * from './lap';
export * from './officialOrder';
export * from './penalty';
export * from './points';
export * from './ranking';
export * from './resultSnapshot';
export * from './session';
export * from './timingEvent';
