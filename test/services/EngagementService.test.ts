import { DAY_MS } from '../../src/domain/common/Clock';
import { ValidationError } from '../../src/domain/common/Errors';
import { EngagementState } from '../../src/types';
import { createHarness, TestHarness } from '../harness';
import { T0 } from '../helpers';

describe('EngagementService', () => {
  let harness: TestHarness;
  let updates: EngagementState[];

  beforeEach(async () => {
    harness = await createHarness();
    updates = [];
    harness.container.eventBus.on('engagement:updated', state => {
      updates.push(state);
    });
  });

  afterEach(async () => {
    await harness.cleanup();
  });

  describe('load', () => {
    it('should create and persist the default state for an unknown user', async () => {
      const state = await harness.container.engagementService.load('u1');

      expect(state).toEqual({
        userId: 'u1',
        onboardingPhase: 'NEW',
        assistantName: null,
        buddyStatus: 'ACTIVE',
        nextContactAt: null,
        createdAt: T0,
        updatedAt: T0
      });
      expect(await harness.container.engagementRepo.findByUser('u1')).toEqual(state);
    });
  });

  describe('setPostponed', () => {
    it('should store the next contact time', async () => {
      const state = await harness.container.engagementService.setPostponed('u1', T0 + DAY_MS);

      expect(state.buddyStatus).toBe('POSTPONED');
      expect(state.nextContactAt).toBe(T0 + DAY_MS);
      expect(updates).toHaveLength(1);
    });

    it('should reject a time that is not in the future', async () => {
      await expect(harness.container.engagementService.setPostponed('u1', T0)).rejects.toThrow(ValidationError);
      expect(updates).toHaveLength(0);
    });
  });

  describe('loadCurrent', () => {
    it('should keep a postponement until its time has passed', async () => {
      const service = harness.container.engagementService;
      await service.setPostponed('u1', T0 + DAY_MS);

      harness.clock.advance(DAY_MS);
      expect((await service.loadCurrent('u1')).buddyStatus).toBe('POSTPONED');

      harness.clock.advance(1);
      const current = await service.loadCurrent('u1');
      expect(current.buddyStatus).toBe('ACTIVE');
      expect(current.nextContactAt).toBeNull();

      const stored = await harness.container.engagementRepo.findByUser('u1');
      expect(stored?.buddyStatus).toBe('ACTIVE');
      expect(stored?.nextContactAt).toBeNull();
    });
  });

  describe('resolveCurrentStatus', () => {
    it('should report an expired postponement as ACTIVE without touching the input', async () => {
      const service = harness.container.engagementService;
      const postponed = await service.setPostponed('u1', T0 + 10);

      const resolved = service.resolveCurrentStatus(postponed, T0 + 11);

      expect(resolved.effectiveStatus).toBe('ACTIVE');
      expect(resolved.mutated).toBe(true);
      expect(resolved.state.nextContactAt).toBeNull();
      expect(postponed.buddyStatus).toBe('POSTPONED');
    });

    it('should leave other states alone', async () => {
      const service = harness.container.engagementService;
      const busy = await service.setBusy('u1');

      const resolved = service.resolveCurrentStatus(busy, T0 + 5 * DAY_MS);

      expect(resolved).toEqual({ effectiveStatus: 'BUSY', state: busy, mutated: false });
    });
  });

  describe('setBusy / setActive', () => {
    it('should clear the next contact time', async () => {
      const service = harness.container.engagementService;
      await service.setPostponed('u1', T0 + DAY_MS);

      const busy = await service.setBusy('u1');
      expect(busy.buddyStatus).toBe('BUSY');
      expect(busy.nextContactAt).toBeNull();

      const active = await service.setActive('u1');
      expect(active.buddyStatus).toBe('ACTIVE');
      expect(active.nextContactAt).toBeNull();
    });
  });

  describe('concurrent updates', () => {
    it('should keep both a status change and a phase change made at once', async () => {
      const service = harness.container.engagementService;
      await service.setPhase('u1', 'AWAITING_PROFILE');

      await Promise.all([service.setBusy('u1'), service.setPhase('u1', 'CONVERSING')]);

      const stored = await harness.container.engagementRepo.findByUser('u1');
      expect(stored?.buddyStatus).toBe('BUSY');
      expect(stored?.onboardingPhase).toBe('CONVERSING');
    });
  });

  describe('setAssistantName', () => {
    it('should store a trimmed name and leave AWAITING_NAME', async () => {
      const service = harness.container.engagementService;
      await service.setPhase('u1', 'AWAITING_NAME');

      const state = await service.setAssistantName('u1', '  Orion ');

      expect(state.assistantName).toBe('Orion');
      expect(state.onboardingPhase).toBe('AWAITING_PROFILE');
    });

    it('should not write when the name is unchanged', async () => {
      const service = harness.container.engagementService;
      await service.setPhase('u1', 'CONVERSING');
      const first = await service.setAssistantName('u1', 'Orion');
      const writes = updates.length;

      harness.clock.advance(1000);
      const second = await service.setAssistantName('u1', 'Orion');

      expect(second.updatedAt).toBe(first.updatedAt);
      expect(second.onboardingPhase).toBe('CONVERSING');
      expect(updates).toHaveLength(writes);
    });

    it('should reject an empty name', async () => {
      await expect(harness.container.engagementService.setAssistantName('u1', '   ')).rejects.toThrow(ValidationError);
    });
  });
});
