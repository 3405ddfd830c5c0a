import { createDatasetStore, datasetSelectors } from '../dataset/datasetStore';
import { MAX_DISPLAY_RECORDS } from '../../core/config/constants';
import type { FetchDetails, MiningRecord } from '../../types/mining';

const makeRecords = (count: number): MiningRecord[] =>
  Array.from({ length: count }, (_, i) => ({ hole_id: `H${i}`, max_depth: i }));

const details: FetchDetails = {
  totalFetched: 250,
  requestedCount: 250,
  fetchTimeSeconds: 1.5,
  pagesFetched: 1,
  dataType: 'Holes'
};

describe('DatasetStore', () => {
  describe('replace', () => {
    it.each([0, 1, 999, 1000, 1001, 2500])('should keep displayRecords a prefix of %i records', (count) => {
      const store = createDatasetStore();
      const records = makeRecords(count);
      store.getState().replace('Holes', records, ['hole_id', 'max_depth']);

      const dataset = store.getState().datasets.Holes;
      expect(dataset.displayRecords).toHaveLength(Math.min(count, MAX_DISPLAY_RECORDS));
      dataset.displayRecords.forEach((record, index) => {
        expect(record).toBe(dataset.records[index]);
      });
    });

    it('should format headers and keep the originals', () => {
      const store = createDatasetStore();
      store.getState().replace('Holes', makeRecords(1), ['hole_id', 'max_depth']);

      expect(store.getState().datasets.Holes.headers).toEqual(['Hole ID', 'Max Depth']);
      expect(store.getState().datasets.Holes.originalHeaders).toEqual(['hole_id', 'max_depth']);
    });

    it('should reset the table page and store meta', () => {
      const store = createDatasetStore();
      store.getState().replace('Holes', makeRecords(500), ['hole_id']);
      store.getState().navigateToPage('Holes', 3);
      expect(store.getState().datasets.Holes.currentPage).toBe(2);

      store.getState().replace('Holes', makeRecords(250), ['hole_id'], {
        totalRecords: 4000,
        filterParams: { states: ['WA'] },
        fetchDetails: details
      });

      const dataset = store.getState().datasets.Holes;
      expect(dataset.currentPage).toBe(0);
      expect(dataset.totalRecords).toBe(4000);
      expect(dataset.filterParams).toEqual({ states: ['WA'] });
      expect(datasetSelectors.getFetchDetails(store.getState(), 'Holes')).toEqual(details);
    });

    it('should never report fewer total records than it holds', () => {
      const store = createDatasetStore();
      store.getState().replace('Assays', makeRecords(30), ['hole_id'], { totalRecords: 10 });
      expect(store.getState().datasets.Assays.totalRecords).toBe(30);
    });

    it('should leave the other kind untouched', () => {
      const store = createDatasetStore();
      store.getState().replace('Holes', makeRecords(5), ['hole_id']);
      expect(store.getState().datasets.Assays.records).toEqual([]);
    });
  });

  describe('clearing', () => {
    it('should drop data and filters on clearAll', () => {
      const store = createDatasetStore();
      store.getState().replace('Holes', makeRecords(5), ['hole_id'], { filterParams: { states: ['QLD'] }, fetchDetails: details });
      store.getState().clearAll('Holes');

      const dataset = store.getState().datasets.Holes;
      expect(dataset.records).toEqual([]);
      expect(dataset.displayRecords).toEqual([]);
      expect(dataset.headers).toEqual([]);
      expect(dataset.totalRecords).toBe(0);
      expect(dataset.filterParams).toEqual({});
      expect(dataset.fetchDetails).toBeNull();
    });

    it('should keep filters on clearDataOnly', () => {
      const store = createDatasetStore();
      store.getState().replace('Holes', makeRecords(5), ['hole_id'], { filterParams: { states: ['QLD'] } });
      store.getState().clearDataOnly('Holes');

      expect(store.getState().datasets.Holes.records).toEqual([]);
      expect(store.getState().datasets.Holes.filterParams).toEqual({ states: ['QLD'] });
    });

    it('should empty both kinds on logout', () => {
      const store = createDatasetStore();
      store.getState().replace('Holes', makeRecords(5), ['hole_id'], { filterParams: { states: ['QLD'] } });
      store.getState().replace('Assays', makeRecords(7), ['hole_id']);
      store.getState().clearOnLogout();

      const fresh = createDatasetStore().getState().datasets;
      expect(store.getState().datasets).toEqual(fresh);
    });
  });

  describe('pagination', () => {
    it('should report no pages without data', () => {
      const store = createDatasetStore();
      expect(datasetSelectors.getPaginationInfo(store.getState(), 'Holes')).toEqual({
        currentPage: 0,
        totalPages: 0,
        recordsPerPage: 100,
        totalRecords: 0,
        displayCount: 0,
        showingRecords: 0,
        hasData: false
      });
    });

    it('should page over the displayed prefix only', () => {
      const store = createDatasetStore();
      store.getState().replace('Holes', makeRecords(2500), ['hole_id']);
      store.getState().navigateToPage('Holes', 99);

      const info = datasetSelectors.getPaginationInfo(store.getState(), 'Holes');
      expect(info.totalPages).toBe(10);
      expect(info.currentPage).toBe(10);
      expect(info.totalRecords).toBe(2500);
      expect(info.showingRecords).toBe(100);

      const page = datasetSelectors.getPageRecords(store.getState(), 'Holes');
      expect(page[0]).toEqual({ hole_id: 'H900', max_depth: 900 });
      expect(page).toHaveLength(100);
    });

    it('should show the remainder on the last page', () => {
      const store = createDatasetStore();
      store.getState().replace('Holes', makeRecords(250), ['hole_id']);
      store.getState().nextPage('Holes');
      store.getState().nextPage('Holes');
      store.getState().nextPage('Holes');

      const info = datasetSelectors.getPaginationInfo(store.getState(), 'Holes');
      expect(info.currentPage).toBe(3);
      expect(info.showingRecords).toBe(50);
    });

    it('should not move before the first page', () => {
      const store = createDatasetStore();
      store.getState().replace('Holes', makeRecords(250), ['hole_id']);
      store.getState().previousPage('Holes');
      expect(store.getState().datasets.Holes.currentPage).toBe(0);
    });

    it('should ignore navigation without data', () => {
      const store = createDatasetStore();
      store.getState().navigateToPage('Assays', 2);
      expect(store.getState().datasets.Assays.currentPage).toBe(0);
    });
  });

  it('should copy filter params so later edits do not leak in', () => {
    const store = createDatasetStore();
    const filters = { states: ['WA'] };
    store.getState().setFilterParams('Assays', filters);
    filters.states.push('NT');

    expect(store.getState().datasets.Assays.filterParams).toEqual({ states: ['WA'] });
  });

  it('should honour a custom display ceiling', () => {
    const store = createDatasetStore({ displayCeiling: 10, recordsPerPage: 4 });
    store.getState().replace('Holes', makeRecords(25), ['hole_id']);

    expect(store.getState().datasets.Holes.displayRecords).toHaveLength(10);
    expect(datasetSelectors.getPaginationInfo(store.getState(), 'Holes').totalPages).toBe(3);
  });
});
