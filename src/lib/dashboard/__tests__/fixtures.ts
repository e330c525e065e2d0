/**
 * Shared test tables
 */

import type { Selection } from '@/types/dashboard';
import type { EntityTableInput } from '../entityTable';
import { buildEntityTable } from '../entityTable';

/**
 * Five samples over two regions and four years. S5 has no geo point
 * and no time; S4 has no year.
 */
export const SAMPLES_INPUT: EntityTableInput = {
  axisNames: ['PC1', 'PC2', 'PC3'],
  entities: [
    { id: 'S1', coords: [0, 0, 0], attributes: { region: 'North', year: 2019, ok: true }, geo: { lat: 10, lon: 20 }, time: 1 },
    { id: 'S2', coords: [1, 1, 1], attributes: { region: 'North', year: 2021, ok: false }, geo: { lat: 11, lon: 21 }, time: 2 },
    { id: 'S3', coords: [2, 2, 2], attributes: { region: 'South', year: 2021, ok: true }, geo: { lat: 12, lon: 22 }, time: 3 },
    { id: 'S4', coords: [3, 3, 3], attributes: { region: 'South', year: null, ok: true }, geo: { lat: 13, lon: 23 }, time: 4 },
    { id: 'S5', coords: [4, 4, 4], attributes: { region: 'North', year: 2022, ok: false } },
  ],
};

export function samplesTable() {
  return buildEntityTable(SAMPLES_INPUT);
}

/** Three entities with every capability, used by the cross-view scenarios */
export const ABC_INPUT: EntityTableInput = {
  entities: [
    { id: 'A', coords: [0, 0], attributes: { group: 'g1' }, geo: { lat: 0, lon: 0 }, time: 0 },
    { id: 'B', coords: [1, 1], attributes: { group: 'g1' }, geo: { lat: 1, lon: 1 }, time: 1 },
    { id: 'C', coords: [2, 2], attributes: { group: 'g2' }, geo: { lat: 40, lon: 40 }, time: 2 },
  ],
};

export function selectionOf(ids: readonly string[], generation = 1): Selection {
  return { ids: new Set(ids), origin: 'system', generation };
}
