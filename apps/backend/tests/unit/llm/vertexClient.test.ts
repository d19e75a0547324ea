import { describe, it, expect, vi, afterEach } from "vitest";
import { assemble } from "../../../src/llm/assembler.js";
import { ProviderError } from "../../../src/llm/errors.js";
import { DEFAULT_GENERATION_CONFIG, SAFETY_THRESHOLDS } from "../../../src/llm/models.js";
import { buildVertexPayload, createVertexClient, readSseChunks } from "../../../src/llm/vertexClient.js";
import type { PromptRequest } from "../../../src/llm/types.js";
import { models } from "../../helpers/fixtures.js";

function sseBody(pieces: string[]): ReadableStream<Uint8Array> {
  const encoder = new TextEncoder();
  return new ReadableStream<Uint8Array>({
    start(controller) {
      for (const piece of pieces) controller.enqueue(encoder.encode(piece));
      controller.close();
    }
  });
}

function stubFetch(response: Response) {
  const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => response);
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

const client = createVertexClient({
  project: "test-project",
  region: "us-central1",
  accessToken: "test-token"
});

function request(streaming: boolean): PromptRequest {
  return {
    model: models.pro,
    contents: "Write a syllabus",
    config: { temperature: 0.95 },
    safety: SAFETY_THRESHOLDS,
    streaming
  };
}

describe("buildVertexPayload", () => {
  it("wraps a string prompt in a single user text part", () => {
    const payload = buildVertexPayload(request(true));

    expect(payload.contents).toEqual([{ role: "user", parts: [{ text: "Write a syllabus" }] }]);
    expect(payload.generationConfig).toEqual({ temperature: 0.95 });
    expect(payload.safetySettings).toEqual([
      { category: "HARM_CATEGORY_HARASSMENT", threshold: "BLOCK_ONLY_HIGH" },
      { category: "HARM_CATEGORY_HATE_SPEECH", threshold: "BLOCK_ONLY_HIGH" },
      { category: "HARM_CATEGORY_SEXUALLY_EXPLICIT", threshold: "BLOCK_ONLY_HIGH" },
      { category: "HARM_CATEGORY_DANGEROUS_CONTENT", threshold: "BLOCK_ONLY_HIGH" }
    ]);
  });

  it("passes content parts through and includes the output cap when set", () => {
    const payload = buildVertexPayload({
      ...request(false),
      contents: [
        { text: "Summarise" },
        { fileData: { mimeType: "application/pdf", fileUri: "gs://course-material/handbook.pdf" } }
      ],
      config: DEFAULT_GENERATION_CONFIG
    });

    expect(payload.contents[0]?.parts).toEqual([
      { text: "Summarise" },
      { fileData: { mimeType: "application/pdf", fileUri: "gs://course-material/handbook.pdf" } }
    ]);
    expect(payload.generationConfig).toEqual({ temperature: 0.1, maxOutputTokens: 2048 });
  });
});

describe("createVertexClient", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("posts a single request to generateContent", async () => {
    const fetchMock = stubFetch(
      new Response(JSON.stringify({ candidates: [{ content: { parts: [{ text: "Syllabus: ..." }] } }] }))
    );

    const response = await client.generate(request(false));

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe(
      "https://us-central1-aiplatform.googleapis.com/v1/projects/test-project/locations/us-central1" +
        "/publishers/google/models/gemini-1.5-pro:generateContent"
    );
    expect(init?.method).toBe("POST");
    expect(init?.headers).toEqual({
      "Content-Type": "application/json",
      Authorization: "Bearer test-token"
    });
    expect(JSON.parse(String(init?.body))).toEqual(buildVertexPayload(request(false)));
    expect(await assemble(request(false), response)).toBe("Syllabus: ...");
  });

  it("reads a streamed response as server-sent events", async () => {
    const fetchMock = stubFetch(
      new Response(
        sseBody([
          'data: {"candidates":[{"content":{"parts":[{"text":"Intro"}]}}]}\r\n\r\ndata: {"candi',
          'dates":[{"content":{"parts":[{"text":"Module 1"}]}}]}\r\n\r\n',
          "data: not-json\r\n\r\n",
          'data: {"candidates":[{"content":{"parts":[{"text":"Wrap-up"}]}}]}'
        ])
      )
    );

    const response = await client.generate(request(true));

    expect(fetchMock.mock.calls[0]?.[0]).toBe(
      "https://us-central1-aiplatform.googleapis.com/v1/projects/test-project/locations/us-central1" +
        "/publishers/google/models/gemini-1.5-pro:streamGenerateContent?alt=sse"
    );
    expect(response.streaming).toBe(true);
    expect(await assemble(request(true), response)).toBe("Intro Module 1  Wrap-up");
  });

  it("rejects when the stream carries a provider error event", async () => {
    stubFetch(
      new Response(
        sseBody([
          'data: {"candidates":[{"content":{"parts":[{"text":"Intro"}]}}]}\r\n\r\n',
          'data: {"error":{"code":500,"message":"Internal error encountered."}}\r\n\r\n'
        ])
      )
    );

    const response = await client.generate(request(true));
    const error = await assemble(request(true), response).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ProviderError);
    expect(error instanceof ProviderError && error.message).toBe("Internal error encountered.");
    expect(error instanceof ProviderError && error.status).toBe(500);
  });

  it("uses the configured base URL and omits auth without a token", async () => {
    const fetchMock = stubFetch(new Response(JSON.stringify({})));
    const local = createVertexClient({ project: "p", region: "r", baseUrl: "http://127.0.0.1:9000" });

    await local.generate(request(false));

    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe("http://127.0.0.1:9000/v1/projects/p/locations/r/publishers/google/models/gemini-1.5-pro:generateContent");
    expect(init?.headers).toEqual({ "Content-Type": "application/json" });
  });

  it("surfaces the provider error message and status", async () => {
    stubFetch(new Response(JSON.stringify({ error: { message: "Permission denied" } }), { status: 403 }));

    const error = await client.generate(request(true)).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ProviderError);
    expect(error instanceof ProviderError && error.message).toBe("Permission denied");
    expect(error instanceof ProviderError && error.status).toBe(403);
  });

  it("falls back to the status code when the error body is not JSON", async () => {
    stubFetch(new Response("upstream unavailable", { status: 503 }));

    await expect(client.generate(request(false))).rejects.toThrow("vertex_error_503");
  });
});

describe("readSseChunks", () => {
  it("cancels the body when iteration stops early", async () => {
    const cancel = vi.fn();
    const encoder = new TextEncoder();
    const body = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(encoder.encode('data: {"candidates":[{"content":{"parts":[{"text":"Intro"}]}}]}\n\n'));
      },
      cancel
    });

    const texts: unknown[] = [];
    for await (const chunk of readSseChunks(body)) {
      texts.push(chunk.candidates?.[0]?.content?.parts?.[0]?.text);
      break;
    }

    expect(texts).toEqual(["Intro"]);
    expect(cancel).toHaveBeenCalledTimes(1);
    expect(body.locked).toBe(false);
  });
});
