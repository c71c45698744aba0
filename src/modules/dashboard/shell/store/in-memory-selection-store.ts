import type { Selection } from '../../../spending-analytics/core/types.js';
import type { SelectionStore } from '../../core/ports.js';

/**
 * Process-wide selection store keyed by username. Lost on restart.
 *
 * The username is the database session user, which is the same for every
 * browser sharing the connection pool. Those viewers share one stored
 * selection, and so does everyone who falls back to UNKNOWN when identity
 * fails. Exports never read or write it; they carry their selection in the
 * request.
 */
export const makeInMemorySelectionStore = (): SelectionStore => {
  const selections = new Map<string, Selection>();

  return {
    get(username) {
      return Promise.resolve(selections.get(username));
    },
    set(username, selection) {
      selections.set(username, selection);
      return Promise.resolve();
    },
  };
};
