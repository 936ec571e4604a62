import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { createDeadline } from "./deadline.js";

describe("createDeadline", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  test("aborts once the timeout elapses", () => {
    const deadline = createDeadline(100);
    expect(deadline.signal.aborted).toBe(false);

    vi.advanceTimersByTime(100);

    expect(deadline.signal.aborted).toBe(true);
    expect(deadline.timedOut()).toBe(true);
  });

  test("follows the parent signal without counting as a timeout", () => {
    const parent = new AbortController();
    const deadline = createDeadline(100, parent.signal);

    parent.abort();

    expect(deadline.signal.aborted).toBe(true);
    expect(deadline.timedOut()).toBe(false);
  });

  test("starts aborted when the parent already is", () => {
    const parent = new AbortController();
    parent.abort();

    const deadline = createDeadline(100, parent.signal);
    expect(deadline.signal.aborted).toBe(true);
  });

  test("dispose stops the timer", () => {
    const deadline = createDeadline(100);
    deadline.dispose();

    vi.advanceTimersByTime(500);

    expect(deadline.signal.aborted).toBe(false);
    expect(deadline.timedOut()).toBe(false);
  });
});
