import {BootstrapError} from "./errors";

type CellState<T> =
    | {status: "pending"}
    | {status: "set", value: T}
    | {status: "failed", error: BootstrapError};

interface Waiter<T> {
    resolve: (value: T) => void;
    reject: (error: BootstrapError) => void;
}

// A value written exactly once and awaited by any number of readers.
//
// Readers that arrive before the write suspend until it happens; a failed cell
// rejects every current and future reader with the same error.
export class WriteOnceCell<T> {
    private state: CellState<T> = {status: "pending"};
    private waiters: Waiter<T>[] = [];

    constructor(readonly name: string) {
    }

    get isSet(): boolean {
        return this.state.status === "set";
    }

    get isSettled(): boolean {
        return this.state.status !== "pending";
    }

    set(value: T): void {
        if (this.state.status !== "pending") {
            throw new Error(`${this.name} was already ${this.state.status}`);
        }
        this.state = {status: "set", value};
        const waiters = this.waiters;
        this.waiters = [];
        waiters.forEach(w => w.resolve(value));
    }

    fail(error: BootstrapError): void {
        if (this.state.status !== "pending") return;
        this.state = {status: "failed", error};
        const waiters = this.waiters;
        this.waiters = [];
        waiters.forEach(w => w.reject(error));
    }

    // Returns the value if it is already written, without waiting.
    peek(): T | undefined {
        return this.state.status === "set" ? this.state.value : undefined;
    }

    wait(signal?: AbortSignal): Promise<T> {
        const state = this.state;
        if (state.status === "set") return Promise.resolve(state.value);
        if (state.status === "failed") return Promise.reject(state.error);
        if (signal?.aborted) {
            return Promise.reject(new BootstrapError("Cancelled", `cancelled while waiting for ${this.name}`));
        }

        return new Promise<T>((resolve, reject) => {
            const waiter: Waiter<T> = {
                resolve: (value) => {
                    signal?.removeEventListener("abort", onAbort);
                    resolve(value);
                },
                reject: (error) => {
                    signal?.removeEventListener("abort", onAbort);
                    reject(error);
                },
            };
            const onAbort = () => {
                this.waiters = this.waiters.filter(w => w !== waiter);
                reject(new BootstrapError("Cancelled", `cancelled while waiting for ${this.name}`));
            };
            signal?.addEventListener("abort", onAbort, {once: true});
            this.waiters.push(waiter);
        });
    }
}
