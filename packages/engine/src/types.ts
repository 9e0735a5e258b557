export type Mark = 'X' | 'O';
export type Cell = Mark | null; // null for empty

export interface Coord {
  r: number;
  c: number;
}

export interface Move extends Coord {
  player: Mark;
}

export type Line = readonly Coord[];

export type Outcome =
  | { status: 'in_progress' }
  | { status: 'win'; winner: Mark; line: Line }
  | { status: 'tie' };

// Label and color are for the presentation layer; the engine only reads mark.
export interface PlayerProfile {
  mark: Mark;
  label: string;
  color: string;
}

export interface EngineConfig {
  boardSize: number;
  players: [PlayerProfile, PlayerProfile];
  aiPlayer: Mark;
  baseDepth: number;
  depthGrowth: number;
}

export interface GameState {
  board: Cell[][];
  config: EngineConfig;
  lines: readonly Line[];
  turn: number;
  moves: Move[];
}
