/**
 * Unit Tests - Component Recovery Coordinator
 *
 * Tier walk, strategy selection, the commit gate, deferred retries and
 * system-wide recovery for both domains.
 */

import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { DiagnosticLedger } from '../../../src/core/diagnostic-ledger';
import { ComponentTier, GlassTier } from '../../../src/core/degradation-tiers';
import {
  ComponentRenderError,
  IllegalStateError,
  NotAttachedError,
  ScopeDestroyedError,
  StateLossError
} from '../../../src/core/errors';
import {
  ComponentRecoveryCoordinator,
  GlassRecoveryCoordinator,
  createComponentRecovery,
  createGlassRecovery
} from '../../../src/core/recovery-coordinator';
import { Renderable, RetryFn } from '../../../src/types/common';
import { FakeClock, FakeHost, failingRetry, succeedingRetry } from '../../helpers/fake-host';

describe('ComponentRecoveryCoordinator', () => {
  let clock: FakeClock;
  let host: FakeHost;
  let ledger: DiagnosticLedger;
  let ceiling: ComponentTier;
  let coordinator: ComponentRecoveryCoordinator<ComponentTier>;

  function strategiesOfLatest(): string[] {
    return ledger.records()[0].recoveryAttempts.map(attempt => attempt.strategy);
  }

  beforeEach(() => {
    clock = new FakeClock();
    host = new FakeHost();
    ledger = new DiagnosticLedger({ now: clock.now, deviceSnapshot: () => host.deviceSnapshot() });
    ceiling = 'normal';
    coordinator = createComponentRecovery(host, ledger, {
      ceiling: () => ceiling,
      retryDelayMs: 100,
      now: clock.now
    });
  });

  afterEach(async () => {
    coordinator.destroy();
    await ledger.whenIdle();
    ledger.destroy();
  });

  describe('tier walk', () => {
    it('moves one tier down per failure', () => {
      const tiers: string[] = [];
      for (let i = 0; i < 4; i++) {
        tiers.push(coordinator.onFailure('toggle-switch:wifi', new Error('boom')).tier);
      }

      expect(tiers).toEqual(['reduced', 'fallback', 'emergency', 'failed']);
      expect(coordinator.stateOf('toggle-switch:wifi')?.retryCount).toBe(4);
    });

    it('stays at the bottom tier once reached', () => {
      for (let i = 0; i < 4; i++) {
        coordinator.onFailure('menu-container', new Error('boom'));
      }
      const rendered = coordinator.onFailure('menu-container', new Error('boom'));

      expect(rendered.tier).toBe('failed');
      expect(rendered.source).toBe('placeholder');
      expect(rendered.inert).toBe(true);
      expect(coordinator.stateOf('menu-container')?.recoverable).toBe(false);
    });

    it('treats untracked components as healthy', () => {
      expect(coordinator.tierOf('dialog:about')).toBe('normal');
      expect(coordinator.stateOf('dialog:about')).toBeUndefined();
    });

    it('picks the fallback style from the new tier', () => {
      const first = coordinator.onFailure('toggle-switch:wifi', new Error('boom'));
      coordinator.onFailure('toggle-switch:wifi', new Error('boom'));
      const third = coordinator.onFailure('toggle-switch:wifi', new Error('boom'));

      expect(first.node).toEqual({ type: 'toggle', checked: false, enabled: true, focusable: true });
      expect(third.node).toEqual({ type: 'toggle', checked: false, enabled: true, focusable: true, label: 'Toggle' });
    });

    it('carries the previous toggle state into its substitute', () => {
      const rendered = coordinator.onFailure('toggle-switch:wifi', new Error('boom'), undefined, {
        previous: { type: 'toggle', checked: true, enabled: false, focusable: false }
      });

      expect(rendered.node).toEqual({ type: 'toggle', checked: true, enabled: false, focusable: true });
    });
  });

  describe('strategies', () => {
    it('retries immediately after state loss and permits a lossy commit', () => {
      const retry = jest.fn<RetryFn>(succeedingRetry);

      const rendered = coordinator.onFailure('settings-panel', new StateLossError(), retry);

      expect(retry).toHaveBeenCalledWith({
        componentId: 'settings-panel',
        attempt: 1,
        tier: 'reduced',
        allowStateLoss: true
      });
      expect(rendered.source).toBe('retry');
      expect(rendered.tier).toBe('reduced');
      expect(rendered.node).toEqual({ type: 'text', text: 'settings-panel ok', color: '#ffffff', size: 14, padding: 8 });
      expect(strategiesOfLatest()).toEqual(['immediate-retry']);
    });

    it('retries immediately on illegal state', () => {
      const retry = jest.fn<RetryFn>(succeedingRetry);
      coordinator.onFailure('dialog:about', new IllegalStateError('commit after save'), retry);
      expect(retry).toHaveBeenCalledTimes(1);
    });

    it('falls back when the retry produces nothing', () => {
      const rendered = coordinator.onFailure('toggle-switch:wifi', new StateLossError(), failingRetry);

      expect(rendered.source).toBe('fallback');
      expect(strategiesOfLatest()).toEqual(['immediate-retry', 'fallback:reduced']);
    });

    it('falls back when the retry throws', () => {
      const rendered = coordinator.onFailure('toggle-switch:wifi', new StateLossError(), () => {
        throw new Error('still broken');
      });

      expect(rendered.source).toBe('fallback');
      expect(ledger.records()[0].recoveryAttempts[0]).toMatchObject({
        strategy: 'immediate-retry',
        success: false,
        detail: 'still broken'
      });
    });

    it('releases the component on lifecycle errors', () => {
      const retry = jest.fn<RetryFn>(succeedingRetry);

      const rendered = coordinator.onFailure('glass-card:prefs', new ScopeDestroyedError(), retry);

      expect(host.released).toEqual(['glass-card:prefs']);
      expect(retry).not.toHaveBeenCalled();
      expect(rendered.source).toBe('fallback');
      expect(strategiesOfLatest()).toEqual(['force-cleanup', 'fallback:reduced']);
    });

    it('aborts retries for unknown failures', () => {
      const retry = jest.fn<RetryFn>(succeedingRetry);

      coordinator.onFailure('toggle-switch:wifi', new ComponentRenderError('toggle-switch:wifi', 'bad thumb'), retry);

      expect(retry).not.toHaveBeenCalled();
      expect(strategiesOfLatest()).toEqual(['abort', 'fallback:reduced']);
    });

    it('stops retrying past the retry cap', () => {
      const retry = jest.fn<RetryFn>(failingRetry);
      for (let i = 0; i < 4; i++) {
        coordinator.onFailure('settings-panel', new StateLossError(), retry);
      }

      expect(retry).toHaveBeenCalledTimes(3);
    });

    it('falls back without a retry function', () => {
      const rendered = coordinator.onFailure('settings-panel', new StateLossError());
      expect(rendered.source).toBe('fallback');
      expect(strategiesOfLatest()).toEqual(['fallback:reduced']);
    });
  });

  describe('delayed retry', () => {
    beforeEach(() => {
      jest.useFakeTimers({ doNotFake: ['setImmediate'] });
    });

    afterEach(() => {
      jest.useRealTimers();
    });

    it('returns a fallback now and delivers the retry later', () => {
      const delivered: Renderable[] = [];
      const retry = jest.fn<RetryFn>(succeedingRetry);

      const now = coordinator.onFailure('glass-card:prefs', new NotAttachedError('glass-card:prefs'), retry, {
        onDeferred: result => delivered.push(result)
      });

      expect(now.source).toBe('fallback');
      expect(retry).not.toHaveBeenCalled();

      jest.advanceTimersByTime(100);

      expect(retry).toHaveBeenCalledWith({
        componentId: 'glass-card:prefs',
        attempt: 1,
        tier: 'reduced',
        allowStateLoss: false
      });
      expect(delivered).toHaveLength(1);
      expect(delivered[0].source).toBe('retry');
      expect(delivered[0].tier).toBe('reduced');
    });

    it('records a successful delayed retry on the component state', () => {
      const retry = jest.fn<RetryFn>(succeedingRetry);

      coordinator.onFailure('glass-card:prefs', new NotAttachedError('glass-card:prefs'), retry);
      clock.advance(100);
      jest.advanceTimersByTime(100);

      expect(coordinator.stateOf('glass-card:prefs')).toMatchObject({
        tier: 'reduced',
        retryCount: 1,
        lastRecovery: 'delayed-retry',
        timestamp: clock.current
      });
      expect(coordinator.stateOf('glass-card:prefs')?.lastError).toBeUndefined();
      expect(ledger.componentStates()[0].details).toMatchObject({ lastRecovery: 'delayed-retry' });
    });

    it('leaves the state alone when another failure superseded the delayed retry', () => {
      const retry = jest.fn<RetryFn>(succeedingRetry);

      coordinator.onFailure('glass-card:prefs', new NotAttachedError('glass-card:prefs'), retry);
      coordinator.onFailure('glass-card:prefs', new Error('boom'));
      jest.advanceTimersByTime(100);

      expect(retry).toHaveBeenCalledTimes(1);
      expect(coordinator.stateOf('glass-card:prefs')).toMatchObject({ tier: 'fallback', retryCount: 2 });
      expect(coordinator.stateOf('glass-card:prefs')?.lastRecovery).toBeUndefined();
    });

    it('passes the lossy-commit permission through', () => {
      host.state.stateSaved = true;
      const retry = jest.fn<RetryFn>(succeedingRetry);

      coordinator.onFailure('glass-card:prefs', new NotAttachedError('glass-card:prefs'), retry);
      jest.advanceTimersByTime(100);

      expect(retry.mock.calls[0][0].allowStateLoss).toBe(true);
    });

    it('does nothing for failures reported after destroy', () => {
      const retry = jest.fn<RetryFn>(succeedingRetry);
      coordinator.destroy();

      const result = coordinator.onFailure('glass-card:prefs', new NotAttachedError('glass-card:prefs'), retry);
      jest.advanceTimersByTime(1000);

      expect(retry).not.toHaveBeenCalled();
      expect(result).toMatchObject({ tier: 'failed', source: 'placeholder', inert: true });
      expect(ledger.size).toBe(0);
      expect(coordinator.stateOf('glass-card:prefs')).toBeUndefined();
    });

    it('drops pending retries on destroy', () => {
      const retry = jest.fn<RetryFn>(succeedingRetry);

      coordinator.onFailure('glass-card:prefs', new NotAttachedError('glass-card:prefs'), retry);
      coordinator.destroy();
      jest.advanceTimersByTime(1000);

      expect(retry).not.toHaveBeenCalled();
    });

    it('does not deliver a failed deferred retry', () => {
      const onDeferred = jest.fn<(result: Renderable) => void>();

      coordinator.onFailure('glass-card:prefs', new NotAttachedError('glass-card:prefs'), failingRetry, {
        onDeferred
      });
      jest.advanceTimersByTime(100);

      expect(onDeferred).not.toHaveBeenCalled();
    });
  });

  describe('transaction safety', () => {
    it('returns a status message without mutating the tree when the scope is finishing', () => {
      host.state.scopeFinishing = true;
      const retry = jest.fn<RetryFn>(succeedingRetry);

      const rendered = coordinator.onFailure('settings-panel', new StateLossError(), retry);

      expect(rendered.mutatesTree).toBe(false);
      expect(rendered.node).toMatchObject({ text: 'settings-panel is temporarily unavailable' });
      expect(retry).not.toHaveBeenCalled();
      expect(coordinator.tierOf('settings-panel')).toBe('reduced');
      expect(strategiesOfLatest()).toEqual(['gate']);
    });

    it('treats an unreadable environment as unsafe', () => {
      jest.spyOn(host, 'environmentState').mockImplementation(() => {
        throw new Error('host gone');
      });

      expect(coordinator.onFailure('settings-panel', new Error('boom')).mutatesTree).toBe(false);
    });

    it('returns the emergency fallback when bookkeeping fails', () => {
      jest.spyOn(ledger, 'updateComponentState').mockImplementation(() => {
        throw new Error('ledger broken');
      });

      const rendered = coordinator.onFailure('menu-container', new Error('boom'));

      expect(rendered.tier).toBe('failed');
      expect(rendered.node).toMatchObject({ text: 'Error: menu-container failed' });
    });
  });

  describe('recovery', () => {
    it('marks a component recovered', () => {
      coordinator.onFailure('toggle-switch:wifi', new Error('boom'));
      coordinator.onFailure('toggle-switch:wifi', new Error('boom'));

      expect(coordinator.markRecovered('toggle-switch:wifi')).toBe(true);
      expect(coordinator.stateOf('toggle-switch:wifi')).toMatchObject({ tier: 'normal', retryCount: 0 });
      expect(coordinator.markRecovered('dialog:about')).toBe(false);
    });

    it('lifts recoverable components to the ceiling without lowering any', () => {
      for (let i = 0; i < 4; i++) {
        coordinator.onFailure('menu-container', new Error('boom'));
      }
      for (let i = 0; i < 3; i++) {
        coordinator.onFailure('dialog:about', new Error('boom'));
      }
      coordinator.onFailure('toggle-switch:wifi', new Error('boom'));
      ceiling = 'fallback';

      const result = coordinator.attemptSystemRecovery();

      expect(result).toEqual({ attempted: 2, improved: ['dialog:about'] });
      expect(coordinator.tierOf('menu-container')).toBe('failed');
      expect(coordinator.tierOf('dialog:about')).toBe('fallback');
      expect(coordinator.tierOf('toggle-switch:wifi')).toBe('reduced');
      expect(coordinator.stateOf('dialog:about')?.retryCount).toBe(0);
    });

    it('skips recovery when the ceiling cannot be computed', () => {
      coordinator.onFailure('toggle-switch:wifi', new Error('boom'));
      const broken = createComponentRecovery(host, ledger, {
        ceiling: () => {
          throw new Error('validation failed');
        }
      });
      broken.onFailure('toggle-switch:wifi', new Error('boom'));

      expect(broken.attemptSystemRecovery()).toEqual({ attempted: 0, improved: [] });
      broken.destroy();
    });

    it('does nothing once destroyed', () => {
      coordinator.onFailure('toggle-switch:wifi', new Error('boom'));
      coordinator.destroy();

      expect(coordinator.isDestroyed).toBe(true);
      expect(coordinator.attemptSystemRecovery()).toEqual({ attempted: 0, improved: [] });
      expect(coordinator.states()).toEqual([]);
    });
  });

  describe('observation', () => {
    it('notifies listeners on tier changes only', () => {
      const changes: string[] = [];
      const unsubscribe = coordinator.onTierChange((id, from, to) => changes.push(`${id}:${from}->${to}`));

      for (let i = 0; i < 5; i++) {
        coordinator.onFailure('menu-container', new Error('boom'));
      }
      unsubscribe();
      coordinator.markRecovered('menu-container');

      expect(changes).toEqual([
        'menu-container:normal->reduced',
        'menu-container:reduced->fallback',
        'menu-container:fallback->emergency',
        'menu-container:emergency->failed'
      ]);
    });

    it('keeps going when a listener throws', () => {
      coordinator.onTierChange(() => {
        throw new Error('listener broken');
      });

      expect(coordinator.onFailure('menu-container', new Error('boom')).source).toBe('fallback');
    });

    it('snapshots component state into the ledger', () => {
      coordinator.onFailure('toggle-switch:wifi', new NotAttachedError('toggle-switch:wifi'));

      expect(ledger.componentStates()).toEqual([
        {
          componentId: 'toggle-switch:wifi',
          tier: 'reduced',
          details: { domain: 'component', retryCount: 1, recoverable: true, failureMode: 'NotAttached' },
          timestamp: clock.current
        }
      ]);
    });

    it('reports health buckets', () => {
      coordinator.onFailure('toggle-switch:wifi', new Error('boom'));
      coordinator.onFailure('toggle-switch:wifi', new Error('boom'));

      expect(coordinator.health()).toEqual([
        {
          componentId: 'toggle-switch:wifi',
          domain: 'component',
          tier: 'fallback',
          bucket: 'degraded',
          retryCount: 2,
          recoverable: true
        }
      ]);
    });
  });
});

describe('GlassRecoveryCoordinator', () => {
  let host: FakeHost;
  let ledger: DiagnosticLedger;
  let ceiling: GlassTier;
  let glass: GlassRecoveryCoordinator;

  beforeEach(() => {
    host = new FakeHost();
    ledger = new DiagnosticLedger({ deviceSnapshot: () => host.deviceSnapshot() });
    ceiling = 'full';
    glass = createGlassRecovery(host, ledger, { ceiling: () => ceiling });
  });

  afterEach(async () => {
    glass.destroy();
    await ledger.whenIdle();
    ledger.destroy();
  });

  it('walks the glass ladder', () => {
    const tiers = [1, 2, 3, 4].map(() => glass.onFailure('glass-card:prefs', new Error('boom')).tier);
    expect(tiers).toEqual(['reduced', 'minimal', 'none', 'none']);
  });

  it('drops the effects tier on the first failure of each component', () => {
    glass.onFailure('glass-card:prefs', new Error('boom'));
    expect(glass.effectsTier()).toBe('reduced');

    glass.onFailure('glass-card:prefs', new Error('boom'));
    expect(glass.effectsTier()).toBe('reduced');

    glass.onFailure('glass-dialog', new Error('boom'));
    expect(glass.effectsTier()).toBe('minimal');
  });

  it('counts a recovered component failing again as a first failure', () => {
    glass.onFailure('glass-card:prefs', new Error('boom'));
    glass.markRecovered('glass-card:prefs');
    glass.onFailure('glass-card:prefs', new Error('boom'));

    expect(glass.effectsTier()).toBe('minimal');
  });

  it('raises the effects tier to the ceiling on system recovery', () => {
    glass.onFailure('glass-card:a', new Error('boom'));
    glass.onFailure('glass-card:b', new Error('boom'));
    glass.onFailure('glass-card:c', new Error('boom'));
    expect(glass.effectsTier()).toBe('none');

    ceiling = 'reduced';
    glass.attemptSystemRecovery();

    expect(glass.effectsTier()).toBe('reduced');
  });

  it('uses glass styles for glass tiers', () => {
    glass.onFailure('glass-card:prefs', new Error('boom'));
    const minimal = glass.onFailure('glass-card:prefs', new Error('boom'));

    expect(minimal.node).toMatchObject({ type: 'container', padding: 8 });
  });
});
