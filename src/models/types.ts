// ============================================
// DEADZONE - Core Type Definitions
// ============================================

// === Players ===
export type PlayerClass = 'Scavenger' | 'Mechanic' | 'Soldier';
export type OfflineMode = 'none' | 'ambush' | 'scavenge';
export type PlayerStatus = 'active' | 'dead';

export interface PlayerStats {
  speed: number;
  stealth: number;
  intelligence: number;
  armor: number;
}

export interface PlayerPosition {
  regionId: string;
  buildingId: string | null;
  floorIndex: number | null;
}

export interface Player {
  id: string;
  name: string;
  playerClass: PlayerClass;
  position: PlayerPosition;
  health: number;
  maxHealth: number;
  stats: PlayerStats;
  equippedWeapon: string | null;
  offlineMode: OfflineMode;
  offlineModeSetAt: number | null;
  offlineActionId: number | null;
  radioFrequency: string | null;
  status: PlayerStatus;
  downCount: number;
  travelingVehicleId: string | null;
  lastLootAt: number | null;
  createdAt: number;
  lastActiveAt: number;
}

export type Inventory = Record<string, number>;

// === World ===
export type RegionKind = 'forest' | 'urban' | 'military' | 'coast';

export interface Region {
  id: string;
  name: string;
  kind: RegionKind;
  dangerLevel: number;
  noise: number;
  zombieCount: number;
  maxZombies: number;
  connectedTo: string[];
  structures: string[];
  pressureDirty: boolean;
  lastPressureTick: number;
}

export interface Floor {
  buildingId: string;
  floorIndex: number;
  cleared: boolean;
  clearedBy: string | null;
  clearedAt: number | null;
  lootTable: string;
}

export interface Building {
  id: string;
  regionId: string;
  name: string;
  floors: Floor[];
}

export type DayPhase = 'day' | 'night';

export interface WorldMeta {
  epoch: number;
  tick: number;
  phase: DayPhase;
  paused: boolean;
}

// === Encounters ===
export type EncounterState =
  | 'Presented'
  | 'SneakResolved'
  | 'AttackResolved'
  | 'Expired'
  | 'Cleared'
  | 'Fled'
  | 'PlayerDown';

export type TerminalEncounterState = Extract<EncounterState, 'Cleared' | 'Fled' | 'PlayerDown'>;
export type EncounterDecision = 'sneak' | 'attack' | 'timeout';

export type ZombieArchetype = 'walker' | 'runner' | 'brute' | 'mutant';

export interface ZombieStats {
  archetype: ZombieArchetype;
  health: number;
  damage: number;
  armor: number;
  speed: number;
}

export interface Encounter {
  id: string;
  playerId: string;
  buildingId: string;
  floorIndex: number;
  enteredAt: number;
  difficulty: number;
  zombie: ZombieStats;
  deadline: number;
  pendingActionId: number | null;
  state: EncounterState;
  decision: EncounterDecision | null;
  alerted: boolean;
  resolvedAt: number | null;
  summary: string | null;
}

// === Pending actions ===
export type PendingActionKind =
  | 'DecisionExpiry'
  | 'OfflineResolution'
  | 'ConstructionComplete'
  | 'VehicleArrival';

export type PendingActionOwner = 'player' | 'region';

export type PendingActionPayload =
  | { kind: 'DecisionExpiry'; encounterId: string }
  | { kind: 'OfflineResolution'; mode: Exclude<OfflineMode, 'none'>; modeSetAt: number }
  | { kind: 'ConstructionComplete'; projectId: string }
  | { kind: 'VehicleArrival'; vehicleId: string; destinationRegionId: string; driverId: string };

export interface PendingAction<P extends PendingActionPayload = PendingActionPayload> {
  id: number;
  kind: P['kind'];
  ownerType: PendingActionOwner;
  ownerId: string;
  dueAt: number;
  createdAt: number;
  payload: P;
}

// === Vehicles ===
export type VehicleType = 'bike' | 'jeep' | 'truck' | 'tank' | 'helicopter';

export interface Vehicle {
  id: string;
  ownerId: string;
  type: VehicleType;
  regionId: string;
  condition: number;
  fuel: number;
  fuelCapacity: number;
  cargoCapacity: number;
  speed: number;
  fuelConsumption: number;
  destinationRegionId: string | null;
}

// === Construction ===
export type StructureType = 'radio_tower' | 'barricade' | 'advanced_workshop' | 'tank' | 'helicopter';
export type ConstructionStatus = 'in_progress' | 'completed' | 'cancelled';

export interface ConstructionProject {
  id: string;
  ownerId: string;
  regionId: string;
  structureType: StructureType;
  workSeconds: number;
  startedAt: number;
  dueAt: number;
  status: ConstructionStatus;
  pendingActionId: number | null;
}

// === Events ===
export type WorldEvent =
  | { type: 'DayPhaseChanged'; phase: DayPhase; day: number; at: number }
  | { type: 'ZombiesSpawned'; regionId: string; spawned: number; zombieCount: number; tick: number }
  | { type: 'EncounterPresented'; playerId: string; encounterId: string; buildingId: string; floorIndex: number; deadline: number; zombie: ZombieStats }
  | { type: 'EncounterResolved'; playerId: string; encounterId: string; state: TerminalEncounterState; decision: EncounterDecision; summary: string }
  | { type: 'FloorCleared'; playerId: string; buildingId: string; floorIndex: number; loot: Inventory }
  | { type: 'PlayerDown'; playerId: string; cause: 'zombie' | 'ambush'; policy: 'respawn' | 'permadeath'; byPlayerId?: string }
  | { type: 'OfflineModeResolved'; playerId: string; mode: Exclude<OfflineMode, 'none'>; outcome: string; trigger: 'scheduled' | 'arrival'; targetId?: string; loot?: Inventory }
  | { type: 'ConstructionCompleted'; playerId: string; projectId: string; structureType: StructureType; regionId: string }
  | { type: 'VehicleArrived'; playerId: string; vehicleId: string; regionId: string }
  | { type: 'RadioMessage'; frequency: string; fromPlayerId: string; recipients: string[]; text: string }
  | { type: 'PendingActionFailed'; actionId: number; kind: PendingActionKind; reason: string };

export type WorldEventType = WorldEvent['type'];
