/**
 * DashboardSessionContext - React binding for a linked-views session
 *
 * One DashboardSession per provider mount. Selection and figures are read
 * through useSyncExternalStore, so a component re-renders only when the
 * store it reads from changes.
 *
 * @example
 * <DashboardSessionProvider table={tableInput} config={config}>
 *   <SelectionCounter />
 * </DashboardSessionProvider>
 */

import {
  createContext,
  useContext,
  useMemo,
  useSyncExternalStore,
  type ReactNode,
} from 'react';
import type { DashboardConfigInput } from '@/lib/dashboard/config';
import type { FigureCache } from '@/lib/dashboard/figureCache';
import { DashboardSession } from '@/lib/dashboard/session';
import type { Figure, Selection, ViewKind } from '@/types/dashboard';

const DashboardSessionContext = createContext<DashboardSession | null>(null);

export interface DashboardSessionProviderProps {
  /** Entity table input, validated on mount */
  table: unknown;
  config?: DashboardConfigInput;
  /** Figure cache shared between providers */
  cache?: FigureCache;
  children: ReactNode;
}

/**
 * A new session is created whenever `table`, `config` or `cache` change
 * identity; keep them stable (module constants, state or memoized values).
 */
export function DashboardSessionProvider({ table, config, cache, children }: DashboardSessionProviderProps) {
  const session = useMemo(
    () => DashboardSession.create(table, config ?? {}, cache ? { cache } : {}),
    [table, config, cache]
  );

  return (
    <DashboardSessionContext.Provider value={session}>
      {children}
    </DashboardSessionContext.Provider>
  );
}

export function useDashboardSession(): DashboardSession {
  const session = useContext(DashboardSessionContext);
  if (!session) {
    throw new Error('useDashboardSession must be used within a DashboardSessionProvider');
  }
  return session;
}

export function useSelection(): Selection {
  const { selection } = useDashboardSession();
  return useSyncExternalStore(selection.subscribe, selection.getSnapshot, selection.getSnapshot);
}

/**
 * "Selected: n / N", updated with every selection change
 */
export function useSelectionCounter(): string {
  const session = useDashboardSession();
  const { ids } = useSelection();
  return `Selected: ${ids.size} / ${session.table.entities.length}`;
}

export function useViewFigure(kind: ViewKind): Figure {
  const view = useDashboardSession().views[kind];
  return useSyncExternalStore(view.subscribe, view.figure, view.figure);
}
