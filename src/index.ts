// ─────────────────────────────────────────────
//  Public surface of the simulation core
// ─────────────────────────────────────────────

export { Simulation } from '@/engine/simulation/Simulation';
export { createSimulationContext } from '@/engine/simulation/SimulationContext';
export type { SimulationContext, SimulationContextOptions } from '@/engine/simulation/SimulationContext';
export { SimulationConfig, resolveSettings } from '@/config';
export type { SimulationSettings, SimulationOverrides } from '@/config';

export { SimulationStore } from '@/engine/state/SimulationStore';
export { createEmptyWorld, allocateId, WorldStateQuery } from '@/engine/state/WorldState';
export type { WorldState, SubsystemKey } from '@/engine/state/WorldState';
export { executeCommand, applyRecipe } from '@/engine/state/commands/CommandPipeline';
export type { Command, CommandType, CommandResult } from '@/engine/state/commands/Command';

export { MoveCommand } from '@/engine/state/commands/MoveCommand';
export { BuildCommand } from '@/engine/state/commands/BuildCommand';
export { GatherCommand } from '@/engine/state/commands/GatherCommand';
export { StopGatheringCommand } from '@/engine/state/commands/StopGatheringCommand';
export { AttackCommand } from '@/engine/state/commands/AttackCommand';
export { UpgradeCommand } from '@/engine/state/commands/UpgradeCommand';
export { CancelUpgradeCommand } from '@/engine/state/commands/CancelUpgradeCommand';
export { DemolishCommand } from '@/engine/state/commands/DemolishCommand';
export { CancelDemolitionCommand } from '@/engine/state/commands/CancelDemolitionCommand';
export { TrainCommand } from '@/engine/state/commands/TrainCommand';
export { TrainVillagersCommand } from '@/engine/state/commands/TrainVillagersCommand';
export { DeployCommand } from '@/engine/state/commands/DeployCommand';
export { DeployVillagersCommand } from '@/engine/state/commands/DeployVillagersCommand';
export { ReinforceArmyCommand } from '@/engine/state/commands/ReinforceArmyCommand';
export { EntrenchCommand } from '@/engine/state/commands/EntrenchCommand';
export { StartResearchCommand } from '@/engine/state/commands/StartResearchCommand';

export { loadCatalog } from '@/engine/loader/CatalogLoader';
export type { Catalog } from '@/engine/loader/CatalogLoader';
export { WorldLoader } from '@/engine/loader/WorldLoader';
export type { WorldSnapshot } from '@/engine/loader/WorldLoader';
export { reconcileBackgroundTime } from '@/engine/systems/time/BackgroundTime';
export { AIController } from '@/engine/systems/ai/AIController';

export { HexMath } from '@/engine/utils/HexMath';
export { hex, hexKey, parseHexKey, hexEquals } from '@/engine/data/types/Hex';
export type { HexCoord, HexKey } from '@/engine/data/types/Hex';
export type { StateChange, StateChangeType, StateChangeOf } from '@/engine/data/types/StateChange';
export { SimulationError } from '@/engine/utils/SimulationError';
export { Logger } from '@/engine/utils/Logger';
export type { LogClass, LogEntry } from '@/engine/utils/Logger';
