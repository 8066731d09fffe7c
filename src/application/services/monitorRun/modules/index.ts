export { Observer } from './observer';
export type { Observation, ObserverConfig } from './observer';
export { CycleRunner } from './cycleRunner';
