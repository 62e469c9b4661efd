/**
 * dashboardStore.ts — Zustand store for the sidebar controls and the last
 * render model. Holds no computation: every submit sends the full control
 * state to the API and stores what comes back.
 */
import { createStore } from 'zustand/vanilla';
import type { DashboardModel, DashboardParams, FilterOptions, IntentBucket, Region, ViewMode } from '../types';
import { ApiError, fetchDashboard, fetchFilterOptions } from '../services/api';

export const DEFAULT_BUCKETS: IntentBucket[] = ['Hot', 'Warm'];
export const DEFAULT_MIN_SCORE = 0.45;

/** Clamp to [0, 1] and snap to the slider's 0.05 step. */
export function snapScore(v: number): number {
  if (!Number.isFinite(v)) return DEFAULT_MIN_SCORE;
  return Math.round(Math.min(1, Math.max(0, v)) * 20) / 20;
}

interface DashboardState extends DashboardParams {
  options: FilterOptions | null;
  model: DashboardModel | null;
  loading: boolean;
  notice: string | null;    // user-facing outcome, e.g. nothing matched
  error: string | null;
}

interface DashboardActions {
  setRegion: (region: Region) => Promise<void>;
  setView: (view: ViewMode) => Promise<void>;
  setSectors: (sectors: string[]) => Promise<void>;
  setBuckets: (buckets: IntentBucket[]) => Promise<void>;
  setMinScore: (score: number) => Promise<void>;
  setQuery: (query: string) => void;
  submit: () => Promise<void>;
  params: () => DashboardParams;
}

export type DashboardStore = DashboardState & DashboardActions;

export interface DashboardApi {
  fetchDashboard: typeof fetchDashboard;
  fetchFilterOptions: typeof fetchFilterOptions;
}

const INIT: Omit<DashboardState, 'region'> = {
  view: 'founder',
  sectors: [],
  buckets: [...DEFAULT_BUCKETS],
  minScore: DEFAULT_MIN_SCORE,
  query: '',
  options: null,
  model: null,
  loading: false,
  notice: null,
  error: null,
};

export function createDashboardStore(
  region: Region = 'CA',
  api: DashboardApi = { fetchDashboard, fetchFilterOptions },
) {
  return createStore<DashboardStore>((set, get) => ({
    region,
    ...INIT,

    params: () => {
      const { region, view, sectors, buckets, minScore, query } = get();
      return { region, view, sectors, buckets, minScore, query };
    },

    setRegion: async (next) => {
      // Sector lists differ per region, so selections do not carry over
      set({ region: next, sectors: [], options: null, model: null });
      try {
        const options = await api.fetchFilterOptions(next);
        set({ options });
      } catch (err) {
        set({ error: err instanceof Error ? err.message : String(err) });
        return;
      }
      await get().submit();
    },

    setView: async (view) => {
      set({ view });
      await get().submit();
    },

    setSectors: async (sectors) => {
      set({ sectors: [...new Set(sectors)] });
      await get().submit();
    },

    setBuckets: async (buckets) => {
      set({ buckets: [...new Set(buckets)] });
      await get().submit();
    },

    setMinScore: async (score) => {
      set({ minScore: snapScore(score) });
      await get().submit();
    },

    setQuery: (query) => set({ query }),

    submit: async () => {
      set({ loading: true, notice: null, error: null });
      try {
        const model = await api.fetchDashboard(get().params());
        set({ model, loading: false });
      } catch (err) {
        if (err instanceof ApiError && (err.code === 'EMPTY_RESULT' || err.code === 'MISSING_DATA')) {
          set({ model: null, notice: err.message, loading: false });
        } else {
          set({ model: null, error: err instanceof Error ? err.message : String(err), loading: false });
        }
      }
    },
  }));
}
