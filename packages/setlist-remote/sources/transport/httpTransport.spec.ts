import { describe, expect, it, vi } from "vitest";

import { httpTransportCreate } from "./httpTransport.js";

describe("httpTransportCreate", () => {
    it("requests the origin plus the verbatim path", async () => {
        const fetchMock = vi.fn(async (..._args: Parameters<typeof fetch>) => new Response("TRANSPORT\t0\t0\t0\t1.1.00\n", { status: 200 }));
        const transport = httpTransportCreate({
            origin: "http://127.0.0.1:8080/",
            timeoutMs: 1_000,
            fetch: fetchMock
        });

        const response = await transport.request("/_/1007;TRANSPORT");

        expect(fetchMock).toHaveBeenCalledTimes(1);
        expect(fetchMock.mock.calls[0]?.[0]).toBe("http://127.0.0.1:8080/_/1007;TRANSPORT");
        expect(response).toEqual({ body: "TRANSPORT\t0\t0\t0\t1.1.00\n", statusCode: 200, ok: true });
    });

    it("reports non-2xx statuses without throwing", async () => {
        const transport = httpTransportCreate({
            origin: "http://127.0.0.1:8080",
            timeoutMs: 1_000,
            fetch: async () => new Response("missing", { status: 404 })
        });

        const response = await transport.request("/_/TRANSPORT");

        expect(response.ok).toBe(false);
        expect(response.statusCode).toBe(404);
    });

    it("propagates connection errors as rejections", async () => {
        const transport = httpTransportCreate({
            origin: "http://127.0.0.1:8080",
            timeoutMs: 1_000,
            fetch: async () => {
                throw new TypeError("fetch failed");
            }
        });

        await expect(transport.request("/_/TRANSPORT")).rejects.toThrow("fetch failed");
    });
});
