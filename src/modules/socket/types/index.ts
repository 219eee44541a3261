/**
 * Socket Module Types
 */

export type { LegRoute, LegRouteResult } from './socket';
