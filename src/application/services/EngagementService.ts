import { BuddyStatus, EngagementState, OnboardingPhase } from '../../types';
import { IEngagementRepository } from '../../domain/repositories/IEngagementRepository';
import { IEventBus } from '../../domain/events/IEventBus';
import { ILogger } from '../../domain/common/ILogger';
import { Clock, systemClock } from '../../domain/common/Clock';
import { ValidationError } from '../../domain/common/Errors';

export interface ResolvedStatus {
  effectiveStatus: BuddyStatus;
  state: EngagementState;
  /** True when `state` differs from the input and must be persisted. */
  mutated: boolean;
}

/**
 * Owns each user's onboarding phase and buddy availability.
 *
 * Every write replaces the whole state document, so a failed write leaves
 * the previous state in place. POSTPONED always carries `nextContactAt`
 * because the state type only admits that pairing.
 */
export class EngagementService {
  constructor(
    private engagementRepo: IEngagementRepository,
    private eventBus: IEventBus,
    private logger: ILogger,
    private clock: Clock = systemClock
  ) {}

  /**
   * Fetch the stored state, creating and persisting the default one
   * (NEW, ACTIVE) for an unknown user.
   */
  async load(userId: string): Promise<EngagementState> {
    const { state, changed } = await this.engagementRepo.update(userId, current => current ?? this.initialState(userId));
    if (changed) {
      this.logger.info(`Created engagement state for user: ${userId}`);
    }
    return state;
  }

  private initialState(userId: string): EngagementState {
    const now = this.clock();
    return {
      userId,
      onboardingPhase: 'NEW',
      assistantName: null,
      buddyStatus: 'ACTIVE',
      nextContactAt: null,
      createdAt: now,
      updatedAt: now
    };
  }

  /**
   * Lazy expiry: a postponement whose date has passed reads as ACTIVE.
   * Pure; the caller persists `state` when `mutated` is set.
   */
  resolveCurrentStatus(state: EngagementState, now: number): ResolvedStatus {
    if (state.buddyStatus === 'POSTPONED' && now > state.nextContactAt) {
      return {
        effectiveStatus: 'ACTIVE',
        state: { ...state, buddyStatus: 'ACTIVE', nextContactAt: null, updatedAt: now },
        mutated: true
      };
    }
    return { effectiveStatus: state.buddyStatus, state, mutated: false };
  }

  /**
   * Load the state with lazy expiry applied and persisted.
   */
  async loadCurrent(userId: string): Promise<EngagementState> {
    const now = this.clock();
    const stored = await this.load(userId);
    if (!this.resolveCurrentStatus(stored, now).mutated) return stored;

    this.logger.info(`Postponement expired for user: ${userId}`);
    return this.mutate(userId, state => this.resolveCurrentStatus(state, now).state);
  }

  async setBusy(userId: string): Promise<EngagementState> {
    return this.mutate(userId, state => ({ ...state, buddyStatus: 'BUSY', nextContactAt: null, updatedAt: this.clock() }));
  }

  async setActive(userId: string): Promise<EngagementState> {
    return this.mutate(userId, state => ({ ...state, buddyStatus: 'ACTIVE', nextContactAt: null, updatedAt: this.clock() }));
  }

  /**
   * @throws {ValidationError} if `nextContactAt` is not in the future
   */
  async setPostponed(userId: string, nextContactAt: number): Promise<EngagementState> {
    const now = this.clock();
    if (!Number.isFinite(nextContactAt) || nextContactAt <= now) {
      throw new ValidationError('nextContactAt must be a future timestamp', { nextContactAt, now });
    }

    return this.mutate(userId, state => ({ ...state, buddyStatus: 'POSTPONED', nextContactAt, updatedAt: now }));
  }

  /**
   * Rename the assistant. Only AWAITING_NAME advances the phase (to
   * AWAITING_PROFILE); repeating the same name writes nothing.
   */
  async setAssistantName(userId: string, name: string): Promise<EngagementState> {
    const trimmed = name.trim();
    if (!trimmed) {
      throw new ValidationError('Assistant name cannot be empty');
    }

    return this.mutate(userId, state => {
      const advance = state.onboardingPhase === 'AWAITING_NAME';
      if (state.assistantName === trimmed && !advance) {
        return state;
      }
      return {
        ...state,
        assistantName: trimmed,
        onboardingPhase: advance ? 'AWAITING_PROFILE' : state.onboardingPhase,
        updatedAt: this.clock()
      };
    });
  }

  async setPhase(userId: string, phase: OnboardingPhase): Promise<EngagementState> {
    return this.mutate(userId, state =>
      state.onboardingPhase === phase ? state : { ...state, onboardingPhase: phase, updatedAt: this.clock() }
    );
  }

  /**
   * Apply `change` to the freshest stored state. Changes for one user run
   * one after another, so concurrent callers never overwrite each other.
   */
  private async mutate(userId: string, change: (state: EngagementState) => EngagementState): Promise<EngagementState> {
    await this.load(userId);
    const { state, changed } = await this.engagementRepo.update(userId, current =>
      change(current ?? this.initialState(userId))
    );
    if (!changed) return state;

    await this.eventBus.emit('engagement:updated', state);
    this.logger.debug(`Engagement updated for user: ${userId}`, {
      phase: state.onboardingPhase,
      buddyStatus: state.buddyStatus
    });
    return state;
  }
}
