/**
 * Short Link Tests
 *
 * @see packages/shared/src/utils/shortlink.ts
 */

import { describe, it, expect, jest } from "@jest/globals";
import {
  generateShortLink,
  generateUniqueShortLink,
  isValidShortLink,
  ShortLinkGenerationError,
  SHORT_LINK_CONFIG,
} from "../src/index.js";

function sequence(...tokens: string[]): () => string {
  let i = 0;
  return () => tokens[i++ % tokens.length];
}

describe("generateShortLink", () => {
  it("should generate 6 alphanumeric characters by default", () => {
    for (let i = 0; i < 200; i++) {
      expect(generateShortLink()).toMatch(/^[A-Za-z0-9]{6}$/);
    }
  });

  it("should respect a custom length", () => {
    expect(generateShortLink(10)).toHaveLength(10);
  });

  it("should only use alphabet characters", () => {
    const token = generateShortLink(500);
    for (const char of token) {
      expect(SHORT_LINK_CONFIG.ALPHABET).toContain(char);
    }
  });

  it("should produce distinct tokens", () => {
    const tokens = new Set(Array.from({ length: 1000 }, () => generateShortLink()));
    expect(tokens.size).toBeGreaterThan(990);
  });
});

describe("generateUniqueShortLink", () => {
  it("should return the first free candidate", async () => {
    const existsCheck = jest.fn(async (_token: string) => false);

    const token = await generateUniqueShortLink(existsCheck);

    expect(isValidShortLink(token)).toBe(true);
    expect(existsCheck).toHaveBeenCalledTimes(1);
    expect(existsCheck).toHaveBeenCalledWith(token);
  });

  it("should discard a taken candidate and return a different one", async () => {
    const taken = new Set(["aaaaaa"]);
    const existsCheck = jest.fn(async (token: string) => taken.has(token));
    const onCollision = jest.fn();

    const token = await generateUniqueShortLink(existsCheck, {
      generate: sequence("aaaaaa", "bbbbbb"),
      onCollision,
    });

    expect(token).toBe("bbbbbb");
    expect(existsCheck).toHaveBeenNthCalledWith(1, "aaaaaa");
    expect(existsCheck).toHaveBeenNthCalledWith(2, "bbbbbb");
    expect(onCollision).toHaveBeenCalledWith("aaaaaa", 1);
  });

  it("should throw after maxAttempts collisions", async () => {
    const existsCheck = jest.fn(async (_token: string) => true);

    await expect(
      generateUniqueShortLink(existsCheck, { maxAttempts: 3 })
    ).rejects.toBeInstanceOf(ShortLinkGenerationError);
    expect(existsCheck).toHaveBeenCalledTimes(3);
  });

  it("should report the attempt count on failure", async () => {
    const error = await generateUniqueShortLink(async () => true, { maxAttempts: 2 }).catch(
      (err: unknown) => err
    );

    expect(error).toBeInstanceOf(ShortLinkGenerationError);
    if (error instanceof ShortLinkGenerationError) {
      expect(error.attempts).toBe(2);
      expect(error.message).toBe("Failed to generate a unique short link after 2 attempts");
    }
  });

  it("should default to 10 attempts", async () => {
    const existsCheck = jest.fn(async (_token: string) => true);

    await expect(generateUniqueShortLink(existsCheck)).rejects.toThrow(ShortLinkGenerationError);
    expect(existsCheck).toHaveBeenCalledTimes(10);
  });
});

describe("isValidShortLink", () => {
  it.each(["aB3xY9", "ZZZZZZ", "000000"])("should accept %s", (token) => {
    expect(isValidShortLink(token)).toBe(true);
  });

  it.each(["", "abc", "aB3xY9k", "ab-cd1", "абвгде", "abc de"])("should reject %p", (token) => {
    expect(isValidShortLink(token)).toBe(false);
  });
});
