import { ClientCache, type ChatClient } from "../../../src/llm/clientCache.js";

function stubClient(): ChatClient {
  return {
    chat: {
      completions: {
        create: async () => ({ choices: [{ message: { content: "{}" } }] }),
      },
    },
  };
}

describe("ClientCache", () => {
  test("reuses the client for the same key and model", () => {
    const created: string[] = [];
    const cache = new ClientCache((apiKey) => {
      created.push(apiKey);
      return stubClient();
    });

    const first = cache.get("sk-test-secret", "gpt-4o-mini");
    const second = cache.get("sk-test-secret", "gpt-4o-mini");

    expect(second).toBe(first);
    expect(created).toEqual(["sk-test-secret"]);
    expect(cache.size).toBe(1);
  });

  test("creates separate clients per model and per key", () => {
    const cache = new ClientCache(() => stubClient());

    const a = cache.get("sk-test-secret", "gpt-4o-mini");
    const b = cache.get("sk-test-secret", "gpt-4o");
    const c = cache.get("sk-other-secret", "gpt-4o-mini");

    expect(b).not.toBe(a);
    expect(c).not.toBe(a);
    expect(cache.size).toBe(3);
  });

  test("clear drops every cached client", () => {
    let count = 0;
    const cache = new ClientCache(() => {
      count += 1;
      return stubClient();
    });

    cache.get("sk-test-secret", "gpt-4o-mini");
    cache.clear();
    cache.get("sk-test-secret", "gpt-4o-mini");

    expect(cache.size).toBe(1);
    expect(count).toBe(2);
  });
});
