import { describe, expect, it, vi } from "vitest";
import { parseConfig, type GenerationConfig } from "../../config";
import { GenerationError, ValidationError } from "../../errors";
import { GenerationClient } from "../client";

type FakeResponse = () => Response | Promise<Response>;

const json = (body: unknown, status = 200): FakeResponse => () =>
    new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
const status = (code: number): FakeResponse => () => new Response("upstream error", { status: code });

const OK_BODY = { model: "mistral:7b", response: "Hello there", prompt_eval_count: 12, eval_count: 3, done: true };

function fakeFetch(...responses: FakeResponse[]) {
    const queue = [...responses];
    return vi.fn(async (_input: string | URL | Request, _init?: RequestInit): Promise<Response> => {
        const next = queue.shift();
        if (!next) {
            throw new Error("unexpected request");
        }
        return next();
    });
}

function setup(fetchImpl: ReturnType<typeof fakeFetch>, overrides: Partial<GenerationConfig> = {}) {
    const sleep = vi.fn(async (_ms: number) => {});
    const config = parseConfig({ generation: overrides }).generation;
    const client = new GenerationClient(config, { fetch: fetchImpl, sleep });
    return { client, sleep };
}

describe("GenerationClient.generate", () => {
    it("posts a non-streaming request and maps the response", async () => {
        const fetchImpl = fakeFetch(json(OK_BODY));
        let clock = 0;
        const client = new GenerationClient(parseConfig().generation, {
            fetch: fetchImpl,
            now: () => (clock += 100),
        });

        const result = await client.generate("Say hi");

        expect(result).toEqual({
            text: "Hello there",
            model: "mistral:7b",
            promptTokens: 12,
            completionTokens: 3,
            done: true,
            durationMs: 100,
            attempts: 1,
        });
        const [url, init] = fetchImpl.mock.calls[0];
        expect(url).toBe("http://localhost:11434/api/generate");
        expect(init?.method).toBe("POST");
        expect(JSON.parse(String(init?.body))).toEqual({
            model: "mistral:7b",
            prompt: "Say hi",
            options: { num_predict: 1024, temperature: 0.7 },
            stream: false,
        });
    });

    it("passes per-call options through", async () => {
        const fetchImpl = fakeFetch(json(OK_BODY));
        const { client } = setup(fetchImpl, { baseUrl: "http://gpu-box:11434/" });

        await client.generate("Summarize", { maxTokens: 64, temperature: 0, model: "llama3:8b" });

        const [url, init] = fetchImpl.mock.calls[0];
        expect(url).toBe("http://gpu-box:11434/api/generate");
        expect(JSON.parse(String(init?.body))).toMatchObject({
            model: "llama3:8b",
            options: { num_predict: 64, temperature: 0 },
        });
    });

    it("defaults missing token counts and done", async () => {
        const { client } = setup(fakeFetch(json({ response: "ok" })));

        const result = await client.generate("Ping");

        expect(result).toMatchObject({
            text: "ok",
            model: "mistral:7b",
            promptTokens: 0,
            completionTokens: 0,
            done: true,
        });
    });

    it("retries server errors with 1s then 2s backoff", async () => {
        const fetchImpl = fakeFetch(status(500), status(500), json(OK_BODY));
        const { client, sleep } = setup(fetchImpl);

        const result = await client.generate("Say hi");

        expect(result.text).toBe("Hello there");
        expect(result.attempts).toBe(3);
        expect(fetchImpl).toHaveBeenCalledTimes(3);
        expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([1_000, 2_000]);
    });

    it("discards the body of a failed response before retrying", async () => {
        const failed = new Response("upstream error", { status: 503 });
        const cancel = vi.spyOn(failed.body ?? new ReadableStream(), "cancel");
        const { client } = setup(fakeFetch(() => failed, json(OK_BODY)));

        await expect(client.generate("Say hi")).resolves.toMatchObject({ text: "Hello there", attempts: 2 });
        expect(cancel).toHaveBeenCalledTimes(1);
    });

    it("raises a connection failure once the budget is spent", async () => {
        const fetchImpl = fakeFetch(status(500), status(500), status(500), status(500));
        const { client, sleep } = setup(fetchImpl);

        const attempt = client.generate("Say hi");

        await expect(attempt).rejects.toBeInstanceOf(GenerationError);
        await expect(attempt).rejects.toMatchObject({
            kind: "connection",
            attempts: 3,
            message: "Generation backend unavailable after 3 attempt(s): Generation backend returned HTTP 500",
        });
        expect(fetchImpl).toHaveBeenCalledTimes(3);
        expect(sleep).toHaveBeenCalledTimes(2);
    });

    it("raises a validation failure when every body is malformed", async () => {
        const { client } = setup(fakeFetch(json({ result: "x" }), json({ result: "x" }), json({ result: "x" })));

        await expect(client.generate("Say hi")).rejects.toMatchObject({
            kind: "validation",
            attempts: 3,
            message:
                'Invalid response from generation backend after 3 attempt(s): Invalid response format: missing "response" field',
        });
    });

    it("retries a body that is not JSON", async () => {
        const notJson: FakeResponse = () => new Response("<html>gateway</html>", { status: 200 });
        const { client } = setup(fakeFetch(notJson, json(OK_BODY)));

        const result = await client.generate("Say hi");

        expect(result.attempts).toBe(2);
    });

    it("treats network errors as connection failures", async () => {
        const refused: FakeResponse = () => {
            throw new TypeError("fetch failed");
        };
        const { client } = setup(fakeFetch(refused), { maxAttempts: 1 });

        await expect(client.generate("Say hi")).rejects.toMatchObject({
            kind: "connection",
            attempts: 1,
            message:
                "Generation backend unavailable after 1 attempt(s): Could not connect to generation backend at http://localhost:11434: fetch failed",
        });
    });

    it("times out a hung attempt", async () => {
        const hung = vi.fn(
            (_input: string | URL | Request, init?: RequestInit) =>
                new Promise<Response>((_resolve, reject) => {
                    const signal = init?.signal;
                    if (!signal) {
                        return;
                    }
                    signal.addEventListener("abort", () => reject(signal.reason));
                })
        );
        const config = parseConfig({ generation: { requestTimeoutMs: 20, maxAttempts: 1 } }).generation;
        const client = new GenerationClient(config, { fetch: hung, sleep: async () => {} });

        await expect(client.generate("Say hi")).rejects.toMatchObject({
            kind: "connection",
            message: "Generation backend unavailable after 1 attempt(s): Request timed out after 20ms",
        });
    });

    it("stops immediately when the caller aborts", async () => {
        const controller = new AbortController();
        const aborting: FakeResponse = () => {
            controller.abort();
            throw new DOMException("This operation was aborted", "AbortError");
        };
        const fetchImpl = fakeFetch(aborting, json(OK_BODY));
        const { client, sleep } = setup(fetchImpl);

        await expect(client.generate("Say hi", { signal: controller.signal })).rejects.toMatchObject({
            kind: "cancelled",
            attempts: 1,
        });
        expect(fetchImpl).toHaveBeenCalledTimes(1);
        expect(sleep).not.toHaveBeenCalled();
    });

    it("validates input before sending anything", async () => {
        const fetchImpl = fakeFetch();
        const { client } = setup(fetchImpl, { maxPromptChars: 5 });

        await expect(client.generate("   ")).rejects.toThrow(new ValidationError("Prompt cannot be empty"));
        await expect(client.generate("toolong")).rejects.toThrow("Prompt too long: 7 characters (max: 5)");
        await expect(client.generate("hi", { temperature: 1.5 })).rejects.toThrow(
            "temperature must be between 0 and 1, got 1.5"
        );
        await expect(client.generate("hi", { maxTokens: 0 })).rejects.toBeInstanceOf(ValidationError);
        expect(fetchImpl).not.toHaveBeenCalled();
    });
});

describe("GenerationClient probes", () => {
    it("tests the connection with one request to /api/tags", async () => {
        const fetchImpl = fakeFetch(json({ models: [] }));
        const { client } = setup(fetchImpl);

        await expect(client.testConnection()).resolves.toBe(true);
        expect(fetchImpl.mock.calls[0][0]).toBe("http://localhost:11434/api/tags");
    });

    it("reports an unreachable backend without retrying", async () => {
        const fetchImpl = fakeFetch(() => {
            throw new TypeError("fetch failed");
        });
        const { client, sleep } = setup(fetchImpl);

        await expect(client.testConnection()).resolves.toBe(false);
        expect(fetchImpl).toHaveBeenCalledTimes(1);
        expect(sleep).not.toHaveBeenCalled();
    });

    it("lists model names", async () => {
        const { client } = setup(fakeFetch(json({ models: [{ name: "mistral:7b" }, { name: "llama3:8b" }] })));

        await expect(client.listModels()).resolves.toEqual(new Set(["mistral:7b", "llama3:8b"]));
    });

    it("lists nothing on errors", async () => {
        const { client } = setup(fakeFetch(status(503), json({ unexpected: true }), json({ models: "none" })));

        await expect(client.listModels()).resolves.toEqual(new Set());
        await expect(client.listModels()).resolves.toEqual(new Set());
        await expect(client.listModels()).resolves.toEqual(new Set());
    });
});
