type LazyState<T> =
    | { kind: "empty" }
    | { kind: "loading"; promise: Promise<T> }
    | { kind: "ready"; value: T };

/**
 * Initialize-once cell. Concurrent callers during the first load share one in-flight
 * promise. A rejected load leaves the cell empty so the next `get()` tries again.
 */
export class Lazy<T> {
    private state: LazyState<T> = { kind: "empty" };

    constructor(private readonly init: () => Promise<T>) {}

    get(): Promise<T> {
        switch (this.state.kind) {
            case "ready":
                return Promise.resolve(this.state.value);
            case "loading":
                return this.state.promise;
            case "empty": {
                const promise = this.load();
                this.state = { kind: "loading", promise };
                return promise;
            }
        }
    }

    isReady(): boolean {
        return this.state.kind === "ready";
    }

    private load(): Promise<T> {
        // Deferred so the "loading" state is recorded before init runs, even if it throws synchronously.
        return Promise.resolve()
            .then(() => this.init())
            .then(
                (value) => {
                    this.state = { kind: "ready", value };
                    return value;
                },
                (error: unknown) => {
                    this.state = { kind: "empty" };
                    throw error;
                }
            );
    }
}
