import { expect, test } from "vitest";

import {
  CopilotApiError,
  GraphqlError,
  NetworkError,
  NotFoundError,
  RateLimitedError,
  UnauthorizedError,
  formatCopilotErrorDetails,
  mapCopilotError,
  mapGraphqlErrors,
} from "@/api/errors";

test("mapGraphqlErrors: maps extension codes to error classes", () => {
  const unauthorized = mapGraphqlErrors([
    { message: "token expired", extensions: { code: "UNAUTHENTICATED" } },
  ]);
  expect(unauthorized).toBeInstanceOf(UnauthorizedError);
  expect(unauthorized.message).toBe("UNAUTHENTICATED token expired");

  expect(mapGraphqlErrors([{ extensions: { code: "FORBIDDEN" } }])).toBeInstanceOf(UnauthorizedError);
  expect(mapGraphqlErrors([{ extensions: { code: "NOT_FOUND" } }])).toBeInstanceOf(NotFoundError);
  expect(mapGraphqlErrors([{ extensions: { code: "RATE_LIMITED" } }])).toBeInstanceOf(RateLimitedError);
});

test("mapGraphqlErrors: joins messages when no code is known", () => {
  const err = mapGraphqlErrors([{ message: "first" }, { message: "second" }]);
  expect(err).toBeInstanceOf(GraphqlError);
  expect(err.info).toEqual({ code: undefined, detail: "first; second" });
  expect(err.message).toBe("first; second");
});

test("mapCopilotError: maps HTTP statuses", async () => {
  const unauthorized = await mapCopilotError(new Response("", { status: 401 }));
  expect(unauthorized).toBeInstanceOf(UnauthorizedError);
  expect(unauthorized.message).toBe("401");

  expect(await mapCopilotError(new Response("", { status: 403 }))).toBeInstanceOf(UnauthorizedError);
  expect(await mapCopilotError(new Response("", { status: 404 }))).toBeInstanceOf(NotFoundError);

  const limited = await mapCopilotError(new Response("slow down", { status: 429 }));
  expect(limited).toBeInstanceOf(RateLimitedError);
  expect(limited.message).toBe("429 slow down");
});

test("mapCopilotError: reads detail from a JSON error body", async () => {
  const fromErrors = await mapCopilotError(
    new Response(JSON.stringify({ errors: [{ message: "boom" }] }), { status: 500 }),
  );
  expect(fromErrors).toBeInstanceOf(CopilotApiError);
  expect(fromErrors.info).toEqual({ status: 500, detail: "boom" });
  expect(fromErrors.message).toBe("500 boom");

  const fromMessage = await mapCopilotError(
    new Response(JSON.stringify({ message: "maintenance" }), { status: 503 }),
  );
  expect(fromMessage.message).toBe("503 maintenance");
});

test("mapCopilotError: network failures become NetworkError", async () => {
  const err = await mapCopilotError(new TypeError("fetch failed"));
  expect(err).toBeInstanceOf(NetworkError);
  expect(err.message).toBe("fetch failed");

  const timeout = new Error("The operation was aborted due to timeout");
  timeout.name = "TimeoutError";
  expect(await mapCopilotError(timeout)).toBeInstanceOf(NetworkError);
});

test("mapCopilotError: passes Copilot errors through and wraps the rest", async () => {
  const original = new NotFoundError({ detail: "gone" });
  expect(await mapCopilotError(original)).toBe(original);

  const wrapped = await mapCopilotError(new Error("unexpected"));
  expect(wrapped).toBeInstanceOf(CopilotApiError);
  expect(wrapped.message).toBe("unexpected");

  expect((await mapCopilotError("plain")).message).toBe("plain");
});

test("formatCopilotErrorDetails: joins the parts that are present", () => {
  expect(formatCopilotErrorDetails({ status: 502, code: "BAD_GATEWAY", detail: "upstream" })).toBe(
    "502 BAD_GATEWAY upstream",
  );
  expect(formatCopilotErrorDetails({ detail: "only detail" })).toBe("only detail");
  expect(formatCopilotErrorDetails({})).toBe("");
});
