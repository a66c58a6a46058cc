/**
 * @module @crew-control/team-router/supervisor-router
 * One supervisor, named members, and the loop between them.
 *
 * The same class runs the top level and every team:
 *   route → execute member → back to the supervisor → ... → end
 *
 * Routing order per step:
 * 1. `rules` (deterministic pre-emption; may update state without deciding)
 * 2. `decide` (oracle), validated against the offered options
 * 3. `fallback` when the oracle fails or answers with something unusable
 *
 * Disabled members are never executed; a route to one goes to the fallback.
 */

import { END, errorMessage, silentLogger, type ILogger } from '@crew-control/contracts';

export type RouteDecision<TMember extends string> = TMember | typeof END;

export interface RouteChoice<TState, TMember extends string> {
  next: RouteDecision<TMember>;
  /** State with any bookkeeping the rule performed (e.g. a cleared pending route). */
  state?: TState;
}

/**
 * Result of a routing rule. Without `next` the rule only updated state and
 * the oracle still decides.
 */
export interface RuleResult<TState, TMember extends string> {
  next?: RouteDecision<TMember>;
  state?: TState;
}

export type MemberNode<TState> = (state: TState) => Promise<TState>;

export interface SupervisorRouterOptions<TState, TMember extends string> {
  name: string;
  members: readonly TMember[];
  nodes: Readonly<Record<TMember, MemberNode<TState>>>;
  /** Oracle call; receives the enabled members plus `end`. */
  decide: (state: TState, options: readonly string[]) => Promise<string>;
  /** Used when the oracle fails or answers outside the options. */
  fallback: RouteDecision<TMember> | ((state: TState) => RouteDecision<TMember>);
  rules?: (state: TState) => RuleResult<TState, TMember> | undefined;
  isEnabled?: (member: TMember) => boolean;
  /** Member executions allowed in one run. */
  stepLimit: number;
  logger?: ILogger;
  onRoute?: (next: RouteDecision<TMember>, source: RouteSource) => void;
}

export type RouteSource = 'rule' | 'oracle' | 'fallback';

export interface RouterRunResult<TState> {
  state: TState;
  steps: number;
  /** The step limit stopped the loop before the supervisor chose `end`. */
  exhausted: boolean;
}

export class SupervisorRouter<TState, TMember extends string> {
  readonly name: string;
  private readonly options: SupervisorRouterOptions<TState, TMember>;
  private readonly logger: ILogger;

  constructor(options: SupervisorRouterOptions<TState, TMember>) {
    this.name = options.name;
    this.options = options;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Loop until the supervisor routes to `end` or the step limit is used up.
   * The state reached so far is returned either way.
   */
  async run(initial: TState): Promise<RouterRunResult<TState>> {
    let state = initial;
    let steps = 0;

    for (;;) {
      const choice = await this.route(state);
      state = choice.state ?? state;

      if (choice.next === END) {
        this.logger.debug(`${this.name} finished`, { steps });
        return { state, steps, exhausted: false };
      }
      if (steps >= this.options.stepLimit) {
        this.logger.warn(`${this.name} hit its step limit`, { limit: this.options.stepLimit, next: choice.next });
        return { state, steps, exhausted: true };
      }

      steps++;
      state = await this.options.nodes[choice.next](state);
    }
  }

  /**
   * One routing decision without executing it.
   */
  async route(current: TState): Promise<RouteChoice<TState, TMember>> {
    const ruled = this.options.rules?.(current);
    const state = ruled?.state ?? current;
    if (ruled?.next !== undefined) {
      return this.resolve({ next: ruled.next, state }, 'rule', state);
    }

    const options = [...this.enabledMembers(), END];
    try {
      const answer = await this.options.decide(state, options);
      const next = this.asDecision(answer);
      if (next !== undefined) {
        return this.resolve({ next, state }, 'oracle', state);
      }
      this.logger.warn(`${this.name} oracle chose an unknown member, using fallback`, { answer });
    } catch (error) {
      this.logger.warn(`${this.name} routing oracle failed, using fallback`, { error: errorMessage(error) });
    }
    return this.resolve({ next: this.fallbackFor(state), state }, 'fallback', state);
  }

  enabledMembers(): TMember[] {
    const isEnabled = this.options.isEnabled;
    return isEnabled ? this.options.members.filter((m) => isEnabled(m)) : [...this.options.members];
  }

  private asDecision(answer: string): RouteDecision<TMember> | undefined {
    if (answer === END) {
      return END;
    }
    return this.options.members.find((member) => member === answer);
  }

  /**
   * Redirect a disabled target to the fallback, and a disabled fallback to `end`.
   */
  private resolve(
    choice: RouteChoice<TState, TMember>,
    source: RouteSource,
    state: TState
  ): RouteChoice<TState, TMember> {
    let next = choice.next;
    if (next !== END && !this.isEnabled(next)) {
      this.logger.debug(`${this.name} skipped disabled member`, { member: next });
      next = this.fallbackFor(state);
      source = 'fallback';
      if (next !== END && !this.isEnabled(next)) {
        next = END;
      }
    }

    this.logger.debug(`${this.name} routed`, { next, source });
    this.options.onRoute?.(next, source);
    return { ...choice, next };
  }

  private fallbackFor(state: TState): RouteDecision<TMember> {
    const fallback = this.options.fallback;
    return typeof fallback === 'function' ? fallback(state) : fallback;
  }

  private isEnabled(member: TMember): boolean {
    return this.options.isEnabled ? this.options.isEnabled(member) : true;
  }
}
