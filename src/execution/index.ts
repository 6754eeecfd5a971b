export type { ExecutionCollaborator, ExecutionOutcome } from './types';
export { SimulationExecutor } from './simulationExecutor';
