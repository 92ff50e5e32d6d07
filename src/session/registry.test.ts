import { MemoryRecorder, REPLY_JSON, ScriptedLLM, deferred, makeDeps, testSettings } from '../testing/fakes';
import { SessionNotFoundError } from '../pipeline/errors';
import { SessionRegistry } from './registry';

describe('SessionRegistry', () => {
  let now = 0;
  const clock = () => new Date(now);

  beforeEach(() => {
    now = Date.parse('2024-05-01T10:00:00.000Z');
  });

  function registry() {
    return new SessionRegistry(makeDeps(new ScriptedLLM()), new MemoryRecorder(), clock);
  }

  it('creates and finds sessions', () => {
    const reg = registry();
    const s = reg.create();
    expect(reg.get(s.id)).toBe(s);
    expect(reg.size).toBe(1);
  });

  it('throws for unknown ids', () => {
    expect(() => registry().get('missing')).toThrow(SessionNotFoundError);
  });

  it('re-keys a session on reset', () => {
    const reg = registry();
    const s = reg.create();
    const oldId = s.id;
    const same = reg.reset(oldId);
    expect(same).toBe(s);
    expect(s.id).not.toBe(oldId);
    expect(reg.get(s.id)).toBe(s);
    expect(() => reg.get(oldId)).toThrow(SessionNotFoundError);
    expect(reg.size).toBe(1);
  });

  it('deletes sessions', () => {
    const reg = registry();
    const s = reg.create();
    expect(reg.delete(s.id)).toBe(true);
    expect(reg.delete(s.id)).toBe(false);
  });

  it('sweeps sessions idle past the ttl', () => {
    const reg = registry();
    const stale = reg.create();
    now += 60_000;
    const fresh = reg.create();
    now += 30_000;

    expect(reg.sweep(60_000)).toBe(1);
    expect(() => reg.get(stale.id)).toThrow(SessionNotFoundError);
    expect(reg.get(fresh.id)).toBe(fresh);
  });

  it('keeps a session whose command is still in flight', async () => {
    const gate = deferred<string>();
    const llm = new ScriptedLLM([() => gate.promise, REPLY_JSON]);
    const deps = makeDeps(llm, { settings: testSettings({ enableRebuttal: false, enableEvaluation: false }) });
    const reg = new SessionRegistry(deps, new MemoryRecorder(), clock);
    const s = reg.create();
    const pending = s.generate({ comment: 'Plants have no protein' });
    now += 120_000;

    expect(reg.sweep(60_000)).toBe(0);
    expect(reg.get(s.id)).toBe(s);

    gate.resolve('[]');
    await pending;
    expect(s.busy).toBe(false);
  });

  it('counts navigation as activity', () => {
    const reg = registry();
    const s = reg.create();
    now += 50_000;
    s.navigate('prev');
    now += 50_000;
    expect(reg.sweep(60_000)).toBe(0);
  });
});
