import type { GeoStat, Region } from '../L0/Ontology.js';
import { lookup } from '../L2/State.js';
import type { RegistryState, StateDraft } from '../L2/State.js';

/**
 * Per-region case counters. Only RecordStore writes here, once per created
 * record version; counters never decrease and regions are never removed.
 */
export class GeoStatsAggregator {
    public increment(draft: StateDraft, region: Region, sequence: number): void {
        const stat = lookup(draft.geoStats, region) ?? (draft.geoStats[region] = { region, totalCases: 0, lastUpdated: sequence });
        stat.totalCases += 1;
        stat.lastUpdated = sequence;
    }

    public get(state: RegistryState, region: Region): GeoStat | undefined {
        return lookup(state.geoStats, region);
    }
}
