/**
 * AutoPitcher Scenario
 *
 * Once a contact has received ten newsletters, newsletters are switched off
 * and, three days later, a pitch flow runs. Newsletters come back on only
 * after the pitch flow, including its one-day delay, has finished.
 */
import { describe, it, expect, beforeEach } from 'vitest';
import { TestHarness, HARNESS_EPOCH } from './harness';
import { newsletterCapFlow, pitchFlow, DAY } from './flows';
import type { PropertyChange } from '../types/contact';

describe('AutoPitcher', () => {
  let t: TestHarness;
  let writes: PropertyChange[];

  beforeEach(async () => {
    t = await new TestHarness({ flows: [newsletterCapFlow, pitchFlow] }).ready();
    writes = [];
    t.properties.subscribe(change => writes.push(change));
  });

  it('turns newsletters back on only after the pitch completes', async () => {
    await t.set('c1', 'should_get_newsletters', true);
    await t.set('c1', 'newsletters_sent', 9);
    expect(t.instancesOf('c1', 'newsletter-cap')).toHaveLength(0);

    const trigger = await t.set('c1', 'newsletters_sent', 10);
    if (!trigger) throw new Error('expected a change');
    await t.assertProperty('c1', 'should_get_newsletters', false);

    await t.advance(3 * DAY);
    await t.assertProperty('c1', 'pitched', true);
    await t.assertProperty('c1', 'should_get_newsletters', false);
    expect(t.engine.aggregator.isResolved(trigger.id)).toBe(false);

    const [pitch] = t.instancesOf('c1', 'pitch');
    expect(pitch.status).toBe('waiting_delay');
    expect(pitch.wakeAt).toBe(HARNESS_EPOCH + 4 * DAY);

    await t.advance(DAY - 1);
    await t.assertProperty('c1', 'should_get_newsletters', false);

    await t.advance(1);
    await t.assertProperty('c1', 'pitch_done', true);
    await t.assertProperty('c1', 'should_get_newsletters', true);
    await expect(t.engine.awaitCompletion(trigger.id)).resolves.toBe(true);

    expect(writes.map(w => `${w.key}=${JSON.stringify(w.newValue)}`)).toEqual([
      'should_get_newsletters=true',
      'newsletters_sent=9',
      'newsletters_sent=10',
      'should_get_newsletters=false',
      'pitched=true',
      'pitch_done=true',
      'should_get_newsletters=true',
    ]);
  });

  it('attributes every write to the triggering change', async () => {
    const trigger = await t.set('c1', 'newsletters_sent', 10);
    if (!trigger) throw new Error('expected a change');
    await t.advance(4 * DAY);

    const [capOff, pitched, pitchDone, capOn] = writes.slice(1);
    expect(capOff.parentCauseId).toBe(trigger.id);
    expect(capOn.parentCauseId).toBe(trigger.id);

    // Pitch writes belong to the start_pitch event, itself caused by the trigger
    const [startPitch] = await t.eventLog.list('c1', { type: 'start_pitch' });
    expect(startPitch.parentCauseId).toBe(trigger.id);
    expect(pitched.parentCauseId).toBe(startPitch.id);
    expect(pitchDone.parentCauseId).toBe(startPitch.id);

    expect(t.instancesOf('c1').map(i => [i.flowId, i.status])).toEqual([
      ['newsletter-cap', 'completed'],
      ['pitch', 'completed'],
    ]);
  });

  it('resolves the trigger once, with both flows counted', async () => {
    const trigger = await t.set('c1', 'newsletters_sent', 10);
    if (!trigger) throw new Error('expected a change');
    await t.advance(4 * DAY);

    const resolved = t.eventsOf('completion.resolved').filter(e => e.causeId === trigger.id);
    expect(resolved).toHaveLength(1);
    expect(resolved[0].timestamp).toBe(HARNESS_EPOCH + 4 * DAY);
    expect((await t.completions.load(trigger.id))?.continuationRan).toBeUndefined();
  });
});
