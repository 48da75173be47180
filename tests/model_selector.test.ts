import test from 'node:test';
import assert from 'node:assert/strict';

import { ModelSelector, ModelSelectorState } from '../src/model_selector';
import { ConfigError, NoModelsConfiguredError } from '../src/structured_error';
import { model } from './helpers';

const models = { A: model('A'), B: model('B'), C: model('C') };

function selector(strategy: 'round_robin' | 'random' | 'weighted', opts: { random?: () => number; weights?: Record<string, number>; state?: ModelSelectorState } = {}) {
    return new ModelSelector({
        models,
        taskModels: { generation: ['A', 'B', 'C'], checking: ['A'], fixing: ['B'], feature: [] },
        strategy,
        ...opts,
    });
}

test('round robin cycles through the pool in configured order', () => {
    const s = selector('round_robin');
    const picked = Array.from({ length: 10 }, () => s.select('generation').id);
    assert.deepEqual(picked, ['A', 'B', 'C', 'A', 'B', 'C', 'A', 'B', 'C', 'A']);
});

test('round robin cursors are per task type and shared through the state object', () => {
    const state = new ModelSelectorState();
    const first = selector('round_robin', { state });
    const second = selector('round_robin', { state });

    assert.equal(first.select('generation').id, 'A');
    assert.equal(first.select('checking').id, 'A');
    assert.equal(second.select('generation').id, 'B');
    assert.equal(state.peek('generation'), 2);
});

test('a cursor left past the end of a shrunken pool restarts at zero', () => {
    const state = new ModelSelectorState();
    const wide = selector('round_robin', { state });
    wide.select('generation');
    wide.select('generation');

    const narrow = new ModelSelector({
        models,
        taskModels: { generation: ['C'], checking: ['A'], fixing: ['B'], feature: ['A'] },
        strategy: 'round_robin',
        state,
    });
    assert.equal(narrow.select('generation').id, 'C');
    assert.equal(state.peek('generation'), 0);
});

test('random picks floor(r * n)', () => {
    const draws = [0, 0.5, 0.99];
    const s = selector('random', { random: () => draws.shift() ?? 0 });
    assert.deepEqual([s.select('generation').id, s.select('generation').id, s.select('generation').id], ['A', 'B', 'C']);
});

test('weighted picks by cumulative weight over the task pool', () => {
    // A=1, B=3, C unlisted (1): total 5
    const weights = { A: 1, B: 3 };
    const pick = (r: number) => selector('weighted', { weights, random: () => r }).select('generation').id;

    assert.equal(pick(0), 'A');
    assert.equal(pick(0.19), 'A');
    assert.equal(pick(0.2), 'B');
    assert.equal(pick(0.79), 'B');
    assert.equal(pick(0.8), 'C');
});

test('an empty pool raises NoModelsConfiguredError', () => {
    const s = selector('round_robin');
    assert.throws(() => s.select('feature'), (err: unknown) => {
        assert.ok(err instanceof NoModelsConfiguredError);
        assert.equal(err.message, "No models configured for task type 'feature'");
        return true;
    });
});

test('modelsFor returns the whole pool and resolve rejects unknown ids', () => {
    const s = selector('round_robin');
    assert.deepEqual(s.modelsFor('generation').map((m) => m.id), ['A', 'B', 'C']);
    assert.throws(() => s.resolve('Z'), ConfigError);
});
