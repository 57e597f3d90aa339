import type { RailCell } from './grid';
import type { ConnectionKind, Direction } from './types';

/** Canonical order, also the bit order of a ConnectionSet */
export const CONNECTION_KINDS: readonly ConnectionKind[] = ['N_S', 'N_E', 'N_W', 'E_S', 'E_W', 'S_W'];

export const CONNECTION_ENDPOINTS: Record<ConnectionKind, readonly [Direction, Direction]> = {
  N_S: ['north', 'south'],
  N_E: ['north', 'east'],
  N_W: ['north', 'west'],
  E_S: ['east', 'south'],
  E_W: ['east', 'west'],
  S_W: ['south', 'west'],
};

const BITS: Record<ConnectionKind, number> = {
  N_S: 1 << 0,
  N_E: 1 << 1,
  N_W: 1 << 2,
  E_S: 1 << 3,
  E_W: 1 << 4,
  S_W: 1 << 5,
};

const CROSSING_BITS = BITS.N_S | BITS.E_W;

export function isConnectionKind(value: unknown): value is ConnectionKind {
  return typeof value === 'string' && CONNECTION_KINDS.some((kind) => kind === value);
}

export function connectionServes(kind: ConnectionKind, direction: Direction): boolean {
  const [a, b] = CONNECTION_ENDPOINTS[kind];
  return a === direction || b === direction;
}

/** Connection joining two distinct edges, order-insensitive */
export function connectionBetween(a: Direction, b: Direction): ConnectionKind | null {
  return CONNECTION_KINDS.find((kind) => {
    const [p, q] = CONNECTION_ENDPOINTS[kind];
    return (p === a && q === b) || (p === b && q === a);
  }) ?? null;
}

/**
 * Immutable set of connection kinds stored as a 6-bit mask
 */
export class ConnectionSet {
  static readonly EMPTY = new ConnectionSet(0);

  private constructor(private readonly bits: number) {}

  static of(...kinds: ConnectionKind[]): ConnectionSet {
    return new ConnectionSet(kinds.reduce((acc, kind) => acc | BITS[kind], 0));
  }

  has(kind: ConnectionKind): boolean {
    return (this.bits & BITS[kind]) !== 0;
  }

  add(kind: ConnectionKind): ConnectionSet {
    return new ConnectionSet(this.bits | BITS[kind]);
  }

  remove(kind: ConnectionKind): ConnectionSet {
    return new ConnectionSet(this.bits & ~BITS[kind]);
  }

  union(other: ConnectionSet): ConnectionSet {
    return new ConnectionSet(this.bits | other.bits);
  }

  intersect(other: ConnectionSet): ConnectionSet {
    return new ConnectionSet(this.bits & other.bits);
  }

  count(): number {
    let n = 0;
    let b = this.bits;
    while (b) {
      b &= b - 1;
      n++;
    }
    return n;
  }

  isEmpty(): boolean {
    return this.bits === 0;
  }

  /** Exactly the two straight kinds, both traversable at once */
  isCrossing(): boolean {
    return this.bits === CROSSING_BITS;
  }

  kinds(): ConnectionKind[] {
    return CONNECTION_KINDS.filter((kind) => this.has(kind));
  }

  first(): ConnectionKind | null {
    return CONNECTION_KINDS.find((kind) => this.has(kind)) ?? null;
  }

  equals(other: ConnectionSet): boolean {
    return this.bits === other.bits;
  }

  toJSON(): ConnectionKind[] {
    return this.kinds();
  }
}

// ============================================================================
// Cell operations
// ============================================================================

export function hasConnection(cell: RailCell, kind: ConnectionKind): boolean {
  return cell.connectionOptions.has(kind);
}

export function connectionCount(cell: RailCell): number {
  return cell.connectionOptions.count();
}

/**
 * Re-establish the active subset after the options changed:
 * a single option is active, a crossing is fully active, and a switch keeps
 * exactly one active leg.
 */
function normalizeActive(cell: RailCell): void {
  const options = cell.connectionOptions;
  if (options.count() === 1 || options.isCrossing()) {
    cell.connectionsActive = options;
    return;
  }

  const active = cell.connectionsActive.intersect(options);
  if (active.isEmpty() && !options.isEmpty()) {
    const first = options.first();
    cell.connectionsActive = first ? ConnectionSet.of(first) : ConnectionSet.EMPTY;
    return;
  }
  cell.connectionsActive = active;
}

/**
 * Add a connection. The first one becomes active, a second one only when it
 * completes the N_S + E_W crossing; anything else stays an inactive switch leg.
 * Returns false when nothing changed (duplicate kind or reserved cell).
 */
export function addConnection(cell: RailCell, kind: ConnectionKind): boolean {
  if (cell.kind === 'reserved' || cell.connectionOptions.has(kind)) {
    return false;
  }

  cell.connectionOptions = cell.connectionOptions.add(kind);
  cell.kind = 'rail';

  if (cell.connectionOptions.count() === 1) {
    cell.connectionsActive = ConnectionSet.of(kind);
  } else if (cell.connectionOptions.isCrossing()) {
    cell.connectionsActive = cell.connectionOptions;
  }

  cell.modelDirty = true;
  return true;
}

export function removeConnection(cell: RailCell, kind: ConnectionKind): boolean {
  if (!cell.connectionOptions.has(kind)) {
    return false;
  }

  cell.connectionOptions = cell.connectionOptions.remove(kind);
  cell.connectionsActive = cell.connectionsActive.remove(kind);

  if (cell.connectionOptions.isEmpty()) {
    cell.kind = 'empty';
    cell.connectionsActive = ConnectionSet.EMPTY;
    cell.model = { variant: 'none', rotation: 0 };
  } else {
    normalizeActive(cell);
  }

  cell.modelDirty = true;
  return true;
}

/**
 * Make `kind` the active leg of a switch. A crossing stays fully active and a
 * kind the cell does not carry is rejected.
 */
export function setActiveConnection(cell: RailCell, kind: ConnectionKind): boolean {
  if (!cell.connectionOptions.has(kind) || cell.connectionOptions.isCrossing()) {
    return false;
  }
  const next = ConnectionSet.of(kind);
  if (cell.connectionsActive.equals(next)) {
    return false;
  }
  cell.connectionsActive = next;
  return true;
}

/** Advance a switch to the next option in canonical order */
export function cycleActiveConnection(cell: RailCell): boolean {
  const options = cell.connectionOptions.kinds();
  if (options.length < 2 || cell.connectionOptions.isCrossing()) {
    return false;
  }
  const current = cell.connectionsActive.first();
  const index = current ? options.indexOf(current) : -1;
  return setActiveConnection(cell, options[(index + 1) % options.length]);
}
