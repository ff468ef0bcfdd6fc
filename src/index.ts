/**
 * Critical speed / critical power estimation and reserve balance simulation.
 */
export * from './types';
export * from './calculations';
export * from './balance';
export { sessionSchema, formatIssues } from './session/schema';
export type { Session, SessionInput } from './session/schema';
export { runSession, protocolInMeters } from './session/run';
export type { SessionReport, SimulationReport } from './session/run';
export { formatSessionReport } from './session/report';
