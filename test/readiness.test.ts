import {BootstrapError} from "../bootstrap/errors";
import {requireReady, retry, waitFor} from "../bootstrap/readiness";

describe("ReadinessGate", () => {
    describe("waitFor", () => {
        test("resolves ready once the predicate holds", async () => {
            let calls = 0;
            const result = await waitFor(async () => ++calls === 3, {interval: 5, timeout: 1_000});

            expect(result).toEqual({status: "ready", attempts: 3});
        });

        test("times out within timeout plus one interval when the predicate never holds", async () => {
            const started = Date.now();
            const result = await waitFor(async () => false, {interval: 50, timeout: 200});
            const elapsed = Date.now() - started;

            expect(result.status).toBe("timeout");
            expect(elapsed).toBeGreaterThanOrEqual(190);
            expect(elapsed).toBeLessThanOrEqual(250);
        });

        test("does not hang on a predicate that never settles", async () => {
            const started = Date.now();
            const result = await waitFor(() => new Promise<boolean>(() => undefined), {interval: 50, timeout: 100});

            expect(result).toEqual({status: "timeout", attempts: 1, lastError: undefined});
            expect(Date.now() - started).toBeLessThanOrEqual(150);
        });

        test("counts a throwing predicate as not ready and reports the last error", async () => {
            const refused = new Error("connect ECONNREFUSED");
            const result = await waitFor(async () => {
                throw refused;
            }, {interval: 5, timeout: 40});

            expect(result.status).toBe("timeout");
            expect(result.status === "timeout" && result.lastError).toBe(refused);
        });

        test("rejects with Cancelled when the signal aborts", async () => {
            const controller = new AbortController();
            setTimeout(() => controller.abort(), 20);

            const waiting = waitFor(async () => false, {interval: 5, timeout: 5_000, signal: controller.signal, description: "k3s API"});

            await expect(waiting).rejects.toMatchObject({kind: "Cancelled", message: "cancelled while waiting for k3s API"});
        });
    });

    describe("requireReady", () => {
        test("returns the number of attempts", async () => {
            await expect(requireReady(async () => true, {interval: 5, timeout: 100}, "Timeout")).resolves.toBe(1);
        });

        test("turns a timeout into an error of the requested kind", async () => {
            const waiting = requireReady(async () => false, {interval: 5, timeout: 20, description: "k3s API on cp-1"}, "InitializationTimeout");

            await expect(waiting).rejects.toMatchObject({
                kind: "InitializationTimeout",
                message: "timed out after 20ms waiting for k3s API on cp-1",
            });
        });
    });

    describe("retry", () => {
        test("reruns transient failures until the operation succeeds", async () => {
            const onRetry = jest.fn();
            let calls = 0;
            const result = await retry(async () => {
                if (++calls < 3) throw new BootstrapError("RebootTimeout", "still rebooting");
                return "up";
            }, {attempts: 3, onRetry});

            expect(result).toBe("up");
            expect(onRetry).toHaveBeenCalledTimes(2);
        });

        test("fails immediately on a non-transient error", async () => {
            const operation = jest.fn(async () => {
                throw new BootstrapError("InstallFailure", "qemu-img failed");
            });

            await expect(retry(operation, {attempts: 5})).rejects.toMatchObject({kind: "InstallFailure"});
            expect(operation).toHaveBeenCalledTimes(1);
        });

        test("gives up after the attempt budget", async () => {
            const operation = jest.fn(async () => {
                throw new BootstrapError("ConnectionError", "connect ECONNREFUSED");
            });

            await expect(retry(operation, {attempts: 2})).rejects.toMatchObject({kind: "ConnectionError"});
            expect(operation).toHaveBeenCalledTimes(2);
        });

        test("wraps plain errors as CommandFailure without retrying", async () => {
            const operation = jest.fn(async () => {
                throw new Error("boom");
            });

            await expect(retry(operation, {attempts: 3})).rejects.toMatchObject({kind: "CommandFailure", message: "boom"});
            expect(operation).toHaveBeenCalledTimes(1);
        });
    });
});
