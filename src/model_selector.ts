// model_selector.ts - picks the backend for each task type
import { ModelConfig, RefinerConfig, RotationStrategy, TaskType } from './config';
import { ConfigError, NoModelsConfiguredError } from './structured_error';

/**
 * Round-robin cursors, one per task type. Shared by every run that uses the
 * same selector state; starts from zero when a process starts.
 */
export class ModelSelectorState {
    private readonly cursors = new Map<TaskType, number>();

    /** Return the cursor for `task` and advance it modulo `size`. */
    take(task: TaskType, size: number): number {
        const stored = this.cursors.get(task) ?? 0;
        const cursor = stored >= 0 && stored < size ? stored : 0;
        this.cursors.set(task, (cursor + 1) % size);
        return cursor;
    }

    peek(task: TaskType): number {
        return this.cursors.get(task) ?? 0;
    }

    reset(): void {
        this.cursors.clear();
    }
}

export interface ModelSelectorOptions {
    models: Record<string, ModelConfig>;
    taskModels: Record<TaskType, string[]>;
    strategy: RotationStrategy;
    /** model id -> weight, for the weighted strategy. */
    weights?: Record<string, number>;
    state?: ModelSelectorState;
    random?: () => number;
}

export class ModelSelector {
    private readonly state: ModelSelectorState;
    private readonly random: () => number;

    constructor(private readonly opts: ModelSelectorOptions) {
        this.state = opts.state ?? new ModelSelectorState();
        this.random = opts.random ?? Math.random;
    }

    static fromConfig(config: RefinerConfig, state?: ModelSelectorState, random?: () => number): ModelSelector {
        const weights: Record<string, number> = {};
        for (const m of Object.values(config.models)) weights[m.id] = m.weight;
        return new ModelSelector({
            models: config.models,
            taskModels: config.taskModels,
            strategy: config.rotationStrategy,
            weights,
            state,
            random,
        });
    }

    get strategy(): RotationStrategy {
        return this.opts.strategy;
    }

    select(task: TaskType): ModelConfig {
        const ids = this.idsFor(task);

        switch (this.opts.strategy) {
            case 'round_robin':
                return this.resolve(ids[this.state.take(task, ids.length)]);
            case 'random':
                return this.resolve(ids[Math.min(ids.length - 1, Math.floor(this.random() * ids.length))]);
            case 'weighted':
                return this.resolve(this.weightedChoice(ids));
        }
    }

    /** Every model in the pool for `task`, in configured order. */
    modelsFor(task: TaskType): ModelConfig[] {
        return this.idsFor(task).map((id) => this.resolve(id));
    }

    resolve(id: string): ModelConfig {
        const model = this.opts.models[id];
        if (!model) {
            throw new ConfigError(`Unknown model id '${id}'`);
        }
        return model;
    }

    private idsFor(task: TaskType): string[] {
        const ids = this.opts.taskModels[task] ?? [];
        if (ids.length === 0) {
            throw new NoModelsConfiguredError(task);
        }
        return ids;
    }

    private weightOf(id: string): number {
        return this.opts.weights?.[id] ?? 1;
    }

    private weightedChoice(ids: string[]): string {
        const total = ids.reduce((sum, id) => sum + this.weightOf(id), 0);
        const draw = this.random() * total;
        let cumulative = 0;
        for (const id of ids) {
            cumulative += this.weightOf(id);
            if (draw < cumulative) return id;
        }
        return ids[ids.length - 1];
    }
}
