import { ConnectionSet } from './connections';
import type { RailGrid } from './grid';
import type { ConnectionKind, RailModel } from './types';

const SINGLE_MODELS: Record<ConnectionKind, RailModel> = {
  N_S: { variant: 'straight', rotation: 0 },
  E_W: { variant: 'straight', rotation: 90 },
  N_E: { variant: 'curve', rotation: 0 },
  E_S: { variant: 'curve', rotation: 90 },
  S_W: { variant: 'curve', rotation: 180 },
  N_W: { variant: 'curve', rotation: 270 },
};

// merge: straight N-S with the branch leaving the north end towards east,
// merge_mirrored: the same branch towards west; both rotated clockwise
const PAIR_MODELS: ReadonlyArray<[ConnectionSet, RailModel]> = [
  [ConnectionSet.of('N_S', 'E_W'), { variant: 'crossing', rotation: 0 }],

  [ConnectionSet.of('N_S', 'N_E'), { variant: 'merge', rotation: 0 }],
  [ConnectionSet.of('E_W', 'E_S'), { variant: 'merge', rotation: 90 }],
  [ConnectionSet.of('N_S', 'S_W'), { variant: 'merge', rotation: 180 }],
  [ConnectionSet.of('E_W', 'N_W'), { variant: 'merge', rotation: 270 }],

  [ConnectionSet.of('N_S', 'N_W'), { variant: 'merge_mirrored', rotation: 0 }],
  [ConnectionSet.of('E_W', 'N_E'), { variant: 'merge_mirrored', rotation: 90 }],
  [ConnectionSet.of('N_S', 'E_S'), { variant: 'merge_mirrored', rotation: 180 }],
  [ConnectionSet.of('E_W', 'S_W'), { variant: 'merge_mirrored', rotation: 270 }],
];

const UNRESOLVED: RailModel = { variant: 'unresolved', rotation: 0 };

/**
 * Visual variant and rotation for a cell's connections.
 * Three or more connections have no asset; the previous model is kept.
 */
export function resolveRailModel(options: ConnectionSet, previous: RailModel): RailModel {
  const count = options.count();

  if (count === 0) {
    return { variant: 'none', rotation: 0 };
  }

  if (count === 1) {
    const kind = options.first();
    return kind ? { ...SINGLE_MODELS[kind] } : { ...previous };
  }

  if (count === 2) {
    const match = PAIR_MODELS.find(([pair]) => pair.equals(options));
    return match ? { ...match[1] } : { ...UNRESOLVED };
  }

  return { ...previous };
}

/** Resolve every cell whose connections changed since the last pass */
export function refreshRailModels(grid: RailGrid): number {
  let refreshed = 0;
  grid.forEachCell((cell) => {
    if (!cell.modelDirty) return;
    cell.model = resolveRailModel(cell.connectionOptions, cell.model);
    cell.modelDirty = false;
    refreshed++;
  });
  return refreshed;
}
