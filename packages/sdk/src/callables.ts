export type CallableFn = (args: Record<string, unknown>) => unknown | Promise<unknown>;

/**
 * Maps the `callable` name of an invoke step to a function.
 * Instances are passed to the engine explicitly, so tests and separate
 * engines never share registrations.
 */
export class CallableRegistry {
    private fns = new Map<string, CallableFn>();

    register(name: string, fn: CallableFn): this {
        if (this.fns.has(name)) {
            throw new Error(`Callable "${name}" is already registered`);
        }
        this.fns.set(name, fn);
        return this;
    }

    resolve(name: string): CallableFn | undefined {
        return this.fns.get(name);
    }

    has(name: string): boolean {
        return this.fns.has(name);
    }

    list(): string[] {
        return Array.from(this.fns.keys());
    }
}

function toNumber(value: unknown, label: string): number {
    const n = typeof value === 'number' ? value : typeof value === 'string' && value.trim() !== '' ? Number(value) : NaN;
    if (!Number.isFinite(n)) {
        throw new Error(`Could not add inputs: ${label} "${String(value)}" is not a valid number`);
    }
    return n;
}

export function addNumbers(args: Record<string, unknown>): number {
    return toNumber(args.num1, 'num1') + toNumber(args.num2, 'num2');
}

export function createBuiltinCallables(): CallableRegistry {
    return new CallableRegistry().register('add_numbers', addNumbers);
}
