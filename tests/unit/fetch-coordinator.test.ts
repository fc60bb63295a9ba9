/**
 * Unit Tests for FetchCoordinator
 *
 * Run state transitions, cursor bookkeeping and last-request-wins ordering.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Mock } from 'vitest';
import { FetchCoordinator } from '../../src/controller/fetch-coordinator.js';
import type { FetchCoordinatorOptions, FetchRequest } from '../../src/controller/fetch-coordinator.js';
import { FetchError, TimeoutError } from '../../src/core/errors.js';
import { createChildLogger } from '../../src/core/logger.js';
import { sortAscending } from '../../src/sorting/sort-model.js';
import type { FetchResult, Fetcher } from '../../src/types/table-types.js';
import {
  alice,
  bob,
  carol,
  dave,
  createTwoPageFetcher,
  deferred,
} from '../fixtures/paged-source.js';
import type { Person } from '../fixtures/paged-source.js';

const request: FetchRequest = { pageSize: 2, sortModel: undefined };

describe('FetchCoordinator', () => {
  let onFetchStart: Mock<() => void>;
  let onPage: Mock<FetchCoordinatorOptions<string, Person>['onPage']>;
  let onError: Mock<(error: FetchError) => void>;

  function createCoordinator(fetcher: Fetcher<string, Person>, fetchTimeoutMs = 0) {
    return new FetchCoordinator<string, Person>({
      fetcher,
      logger: createChildLogger({ component: 'FetchCoordinatorTest' }),
      fetchTimeoutMs,
      onFetchStart,
      onPage,
      onError,
    });
  }

  beforeEach(() => {
    onFetchStart = vi.fn<() => void>();
    onPage = vi.fn<FetchCoordinatorOptions<string, Person>['onPage']>();
    onError = vi.fn<(error: FetchError) => void>();
  });

  describe('successful fetches', () => {
    it('should move to fetching synchronously and back to idle on load', async () => {
      const coordinator = createCoordinator(createTwoPageFetcher());

      const pending = coordinator.fetchPage(0, request);
      expect(coordinator.state).toEqual({ status: 'fetching' });
      expect(onFetchStart).toHaveBeenCalledTimes(1);

      await expect(pending).resolves.toBe('loaded');
      expect(coordinator.state).toEqual({ status: 'idle' });
      expect(onPage).toHaveBeenCalledWith([alice, bob], 0, 0);
    });

    it('should record the next cursor and use it for the following page', async () => {
      const fetcher = createTwoPageFetcher();
      const coordinator = createCoordinator(fetcher);
      const sorted: FetchRequest = { pageSize: 2, sortModel: sortAscending('name') };

      await coordinator.fetchPage(0, sorted);
      expect(coordinator.paginationKeys.entries()).toEqual([[1, 't1']]);
      expect(coordinator.hasNextPage).toBe(true);
      expect(coordinator.hasPreviousPage).toBe(false);

      await coordinator.fetchPage(1, sorted);

      expect(fetcher).toHaveBeenLastCalledWith(2, sortAscending('name'), 't1', expect.any(AbortSignal));
      expect(onPage).toHaveBeenLastCalledWith([carol, dave], 1, 0);
      expect(coordinator.pageIndex).toBe(1);
      expect(coordinator.hasNextPage).toBe(false);
      expect(coordinator.hasPreviousPage).toBe(true);
    });

    it('should request the first page without a cursor', async () => {
      const fetcher = createTwoPageFetcher();
      const coordinator = createCoordinator(fetcher);

      await coordinator.fetchPage(0, request);

      expect(fetcher).toHaveBeenCalledWith(2, undefined, undefined, expect.any(AbortSignal));
    });

    it('should forget cursors on resetPagination', async () => {
      const coordinator = createCoordinator(createTwoPageFetcher());
      await coordinator.fetchPage(0, request);

      coordinator.resetPagination();

      expect(coordinator.paginationKeys.size).toBe(0);
    });
  });

  describe('failures', () => {
    it('should move to error and keep page index and cursors', async () => {
      const fetcher = vi.fn<Fetcher<string, Person>>();
      fetcher.mockResolvedValueOnce({ items: [alice, bob], nextPageToken: 't1' });
      fetcher.mockRejectedValueOnce(new Error('boom'));
      const coordinator = createCoordinator(fetcher);
      await coordinator.fetchPage(0, request);

      await expect(coordinator.fetchPage(1, request)).resolves.toBe('failed');

      expect(coordinator.state.status).toBe('error');
      expect(coordinator.currentError?.message).toBe('Failed to fetch page 1: boom');
      expect(onError).toHaveBeenCalledWith(coordinator.currentError);
      expect(coordinator.pageIndex).toBe(0);
      expect(coordinator.paginationKeys.get(1)).toBe('t1');
    });

    it('should treat a synchronous throw as a failed fetch', async () => {
      const fetcher = vi.fn<Fetcher<string, Person>>(() => {
        throw new Error('not connected');
      });
      const coordinator = createCoordinator(fetcher);

      await expect(coordinator.fetchPage(0, request)).resolves.toBe('failed');
      expect(coordinator.currentError?.message).toBe('Failed to fetch page 0: not connected');
    });

    it('should fail with a timeout when the fetcher exceeds its deadline', async () => {
      const hung = deferred<FetchResult<string, Person>>();
      const coordinator = createCoordinator(
        vi.fn<Fetcher<string, Person>>(() => hung.promise),
        10
      );

      await expect(coordinator.fetchPage(0, request)).resolves.toBe('failed');

      const error = coordinator.currentError;
      expect(error?.cause).toBeInstanceOf(TimeoutError);
      expect(error?.message).toBe('Failed to fetch page 0: Fetching page 0 exceeded 10ms');
    });

    it('should fail and roll back the page index when merging the page throws', async () => {
      const coordinator = createCoordinator(createTwoPageFetcher());
      await coordinator.fetchPage(0, request);
      onPage.mockImplementationOnce(() => {
        throw new Error('merge failed');
      });

      await expect(coordinator.fetchPage(1, request)).resolves.toBe('failed');

      expect(coordinator.state.status).toBe('error');
      expect(coordinator.currentError?.message).toBe('Failed to fetch page 1: merge failed');
      expect(onError).toHaveBeenCalledTimes(1);
      expect(coordinator.pageIndex).toBe(0);
      expect(coordinator.hasNextPage).toBe(true);
      expect(coordinator.paginationKeys.get(1)).toBe('t1');
    });

    it('should clear the error on the next successful fetch', async () => {
      const fetcher = vi.fn<Fetcher<string, Person>>();
      fetcher.mockRejectedValueOnce(new Error('boom'));
      fetcher.mockResolvedValueOnce({ items: [alice] });
      const coordinator = createCoordinator(fetcher);

      await coordinator.fetchPage(0, request);
      await coordinator.fetchPage(0, request);

      expect(coordinator.state).toEqual({ status: 'idle' });
      expect(coordinator.currentError).toBeUndefined();
      expect(coordinator.hasNextPage).toBe(false);
    });
  });

  describe('overlapping fetches', () => {
    it('should abort and discard the older request', async () => {
      const slow = deferred<FetchResult<string, Person>>();
      const signals: AbortSignal[] = [];
      const fetcher = vi.fn<Fetcher<string, Person>>((_size, _sort, _token, signal) => {
        signals.push(signal);
        return signals.length === 1 ? slow.promise : Promise.resolve({ items: [carol] });
      });
      const coordinator = createCoordinator(fetcher);

      const first = coordinator.fetchPage(0, request);
      const second = coordinator.fetchPage(0, request);

      await expect(second).resolves.toBe('loaded');
      await expect(first).resolves.toBe('superseded');
      expect(signals[0].aborted).toBe(true);
      expect(signals[1].aborted).toBe(false);
      expect(onPage).toHaveBeenCalledTimes(1);
      expect(onPage).toHaveBeenCalledWith([carol], 0, 0);
      expect(coordinator.generation).toBe(2);

      // A late answer from the aborted fetcher changes nothing
      slow.resolve({ items: [dave] });
      await slow.promise;
      expect(onPage).toHaveBeenCalledTimes(1);
    });

    it('should not report a superseded failure', async () => {
      const slow = deferred<FetchResult<string, Person>>();
      let calls = 0;
      const coordinator = createCoordinator(
        vi.fn<Fetcher<string, Person>>(() => (++calls === 1 ? slow.promise : Promise.resolve({ items: [] })))
      );

      const first = coordinator.fetchPage(0, request);
      await coordinator.fetchPage(0, request);
      slow.reject(new Error('late failure'));

      await expect(first).resolves.toBe('superseded');
      expect(onError).not.toHaveBeenCalled();
      expect(coordinator.state).toEqual({ status: 'idle' });
    });
  });

  describe('dispose()', () => {
    it('should abort the in-flight fetch and drop its result', async () => {
      const slow = deferred<FetchResult<string, Person>>();
      let received: AbortSignal | undefined;
      const coordinator = createCoordinator(
        vi.fn<Fetcher<string, Person>>((_size, _sort, _token, signal) => {
          received = signal;
          return slow.promise;
        })
      );

      const pending = coordinator.fetchPage(0, request);
      coordinator.dispose();

      await expect(pending).resolves.toBe('superseded');
      expect(received?.aborted).toBe(true);
      expect(onPage).not.toHaveBeenCalled();
      expect(onError).not.toHaveBeenCalled();
    });
  });
});
