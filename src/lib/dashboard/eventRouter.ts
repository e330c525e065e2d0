/**
 * Event Router - broadcasts selections to views without feedback loops
 *
 * Each registered view remembers the last generation it rendered. A view
 * never renders the same generation twice and never redraws a selection it
 * produced itself, so a cascade of updates always terminates.
 *
 * Publishes that arrive while a broadcast is running (a view reacting by
 * selecting something) are queued and delivered in order afterwards.
 */

import { createLogger } from '@/lib/logger';
import type { Selection, ViewKind } from '@/types/dashboard';

const logger = createLogger('EventRouter');

/** Number of generations whose outcomes are kept for inspection */
const TALLY_LIMIT = 64;

export type RefreshOutcome = 'highlighted' | 'rebuilt';
export type RouteOutcome = 'skipped' | 'acknowledged' | RefreshOutcome;

/**
 * What the router needs from a view
 */
export interface RoutedView {
  readonly kind: ViewKind;
  /** Disabled views (missing capability) are registered but never refreshed */
  isEnabled(): boolean;
  /** True when the view's visible state already shows these ids */
  reflects(selection: Selection): boolean;
  /** Record the selection without redrawing */
  acknowledge(selection: Selection): void;
  refresh(selection: Selection): RefreshOutcome;
  /** Redraw after a parameter change */
  rebuild(selection: Selection): void;
}

interface Registration {
  view: RoutedView;
  lastRenderedGeneration: number;
}

export type GenerationTally = Partial<Record<ViewKind, RouteOutcome>>;

export class EventRouter {
  private readonly registrations = new Map<ViewKind, Registration>();
  private readonly queue: Selection[] = [];
  private readonly tallies = new Map<number, GenerationTally>();
  private dispatching = false;

  /**
   * Register a view. Replaces any view of the same kind.
   */
  register(view: RoutedView): () => void {
    const registration: Registration = { view, lastRenderedGeneration: -1 };
    this.registrations.set(view.kind, registration);
    return () => {
      if (this.registrations.get(view.kind) === registration) {
        this.registrations.delete(view.kind);
      }
    };
  }

  lastRenderedGeneration(kind: ViewKind): number {
    return this.registrations.get(kind)?.lastRenderedGeneration ?? -1;
  }

  publish(selection: Selection): void {
    this.queue.push(selection);
    if (this.dispatching) return;

    this.dispatching = true;
    try {
      let next = this.queue.shift();
      while (next) {
        this.broadcast(next);
        next = this.queue.shift();
      }
    } finally {
      this.dispatching = false;
      this.queue.length = 0;
    }
  }

  /**
   * Force a view to redraw for the given selection after its structural
   * parameters (axes, grouping, aesthetics, options) changed.
   */
  refreshStructure(kind: ViewKind, selection: Selection): RouteOutcome {
    const registration = this.registrations.get(kind);
    if (!registration || !registration.view.isEnabled()) {
      return 'skipped';
    }
    registration.view.rebuild(selection);
    registration.lastRenderedGeneration = Math.max(
      registration.lastRenderedGeneration,
      selection.generation
    );
    return 'rebuilt';
  }

  /** Outcomes per view for one generation */
  tally(generation: number): GenerationTally {
    return { ...(this.tallies.get(generation) ?? {}) };
  }

  /** Number of views that redrew for one generation */
  renderCount(generation: number): number {
    return Object.values(this.tally(generation)).filter(
      outcome => outcome === 'highlighted' || outcome === 'rebuilt'
    ).length;
  }

  private broadcast(selection: Selection) {
    const tally: GenerationTally = this.tallies.get(selection.generation) ?? {};
    this.tallies.set(selection.generation, tally);
    this.trimTallies();

    for (const registration of this.registrations.values()) {
      const outcome = this.route(registration, selection);
      // A replayed generation keeps the outcome of its first delivery
      if (tally[registration.view.kind] === undefined || outcome !== 'skipped') {
        tally[registration.view.kind] = outcome;
      }
    }
    logger.debug(`Generation ${selection.generation} from ${selection.origin}:`, tally);
  }

  private route(registration: Registration, selection: Selection): RouteOutcome {
    const { view } = registration;
    if (selection.generation <= registration.lastRenderedGeneration) {
      return 'skipped';
    }
    if (!view.isEnabled()) {
      return 'skipped';
    }

    registration.lastRenderedGeneration = selection.generation;
    if (selection.origin === view.kind && view.reflects(selection)) {
      view.acknowledge(selection);
      return 'acknowledged';
    }
    return view.refresh(selection);
  }

  private trimTallies() {
    while (this.tallies.size > TALLY_LIMIT) {
      const oldest = this.tallies.keys().next();
      if (oldest.done) break;
      this.tallies.delete(oldest.value);
    }
  }
}
