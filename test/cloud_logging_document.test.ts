import { describe, expect, it } from "vitest";
import { LogLevel, type FieldEntry, type FieldMap, type LogEvent, type Scope } from "../src/lib/observability/types";
import { normalizeKey, normalizeSegment, splitKey } from "../src/lib/observability/keys";
import { CIRCULAR_PLACEHOLDER, nestFields } from "../src/lib/observability/nesting";
import {
  parseSeverity,
  resolveSeverity,
  severityForLevel,
} from "../src/lib/observability/severity";
import {
  INSERT_ID_KEY,
  LABELS_KEY,
  routeFields,
  stringifyValue,
} from "../src/lib/observability/special-fields";
import { projectSpan } from "../src/lib/observability/span";
import { buildDocument, formatEvent, formatEventLine } from "../src/lib/observability/document";
import {
  SPAN_ID_KEY,
  TRACE_KEY,
  TRACE_SAMPLED_KEY,
  formatSpanId,
  isValidTraceId,
  traceFields,
} from "../src/lib/observability/trace";
import {
  SOURCE_LOCATION_KEY,
  libraryDirectory,
  parseCallsite,
  sourceLocationFields,
} from "../src/lib/observability/source-location";

// ============================================================================
// Key Normalization Tests
// ============================================================================

describe("observability/keys", () => {
  it("converts snake_case segments to camelCase", () => {
    expect(normalizeSegment("request_method")).toBe("requestMethod");
    expect(normalizeSegment("cache_validated_with_origin_server")).toBe("cacheValidatedWithOriginServer");
  });

  it("lowercases the first character", () => {
    expect(normalizeSegment("RequestId")).toBe("requestId");
    expect(normalizeSegment("_private")).toBe("private");
  });

  it("collapses repeated underscores and keeps trailing ones", () => {
    expect(normalizeSegment("a__b")).toBe("aB");
    expect(normalizeSegment("foo_")).toBe("foo_");
  });

  it("treats reserved names like any other segment", () => {
    expect(normalizeSegment("http_request")).toBe("httpRequest");
    expect(normalizeSegment("insert_id")).toBe("insertId");
  });

  it("is idempotent", () => {
    for (const segment of ["request_method", "requestMethod", "HTTP_status", "a__b", "foo_", "_x"]) {
      const once = normalizeSegment(segment);
      expect(normalizeSegment(once)).toBe(once);
    }
  });

  it("normalizes every segment of a dotted key", () => {
    expect(normalizeKey("http_request.remote_ip")).toBe("httpRequest.remoteIp");
    expect(splitKey("a..b_c")).toEqual(["a", "bC"]);
    expect(splitKey("...")).toEqual([]);
  });
});

// ============================================================================
// Path Nesting Tests
// ============================================================================

describe("observability/nesting", () => {
  it("merges keys sharing a prefix into one object", () => {
    const nested = nestFields([
      ["db.query_time", 5],
      ["db.rows", 2],
      ["user_id", 7],
    ]);

    expect(nested).toEqual({ db: { queryTime: 5, rows: 2 }, userId: 7 });
  });

  it("lets the later scalar win at the same path", () => {
    expect(nestFields([["count", 1], ["count", 2]])).toEqual({ count: 2 });
  });

  it("replaces a scalar with an object when a deeper path follows", () => {
    expect(nestFields([["db", "primary"], ["db.host", "a"]])).toEqual({ db: { host: "a" } });
  });

  it("treats literal dotted keys and nested mappings as the same path", () => {
    expect(nestFields([["meta", { request_id: "a" }], ["meta.request_id", "b"]])).toEqual({
      meta: { requestId: "b" },
    });
    expect(nestFields([["meta.request_id", "b"], ["meta", { request_id: "a" }]])).toEqual({
      meta: { requestId: "a" },
    });
  });

  it("normalizes keys inside nested mappings", () => {
    const structured: FieldMap = { order_id: "ord-1", line_items: { sku_code: "X1" } };
    expect(nestFields([["structured_log", structured]])).toEqual({
      structuredLog: { orderId: "ord-1", lineItems: { skuCode: "X1" } },
    });
  });

  it("renders errors as name, message and stack", () => {
    const nested = nestFields([["cause", new Error("boom")]]);
    expect(nested.cause).toMatchObject({ name: "Error", message: "boom" });
    expect(nested.cause).toHaveProperty("stack");
  });

  it("renders non-finite numbers as strings", () => {
    expect(nestFields([["ratio", Number.NaN]])).toEqual({ ratio: "NaN" });
  });

  it("replaces cycles with a placeholder", () => {
    const context: FieldMap = { a: 1 };
    context.self = context;

    expect(nestFields([["ctx", context]])).toEqual({ ctx: { a: 1, self: CIRCULAR_PLACEHOLDER } });
  });

  it("normalizes prototype-like keys into ordinary ones", () => {
    expect(nestFields([["__proto__.polluted", true]])).toEqual({ proto__: { polluted: true } });
    expect(Object.prototype).not.toHaveProperty("polluted");
  });
});

// ============================================================================
// Severity Tests
// ============================================================================

describe("observability/severity", () => {
  it("maps levels to provider severities", () => {
    expect(severityForLevel(LogLevel.TRACE)).toBe("DEBUG");
    expect(severityForLevel(LogLevel.DEBUG)).toBe("DEBUG");
    expect(severityForLevel(LogLevel.INFO)).toBe("INFO");
    expect(severityForLevel(LogLevel.WARN)).toBe("WARNING");
    expect(severityForLevel(LogLevel.ERROR)).toBe("ERROR");
  });

  it("maps unknown levels to DEFAULT", () => {
    const unknownLevel: number = 99;
    expect(severityForLevel(unknownLevel)).toBe("DEFAULT");
  });

  it("parses provider tokens in any case", () => {
    expect(parseSeverity("notice")).toBe("NOTICE");
    expect(parseSeverity(" critical ")).toBe("CRITICAL");
    expect(parseSeverity("EMERGENCY")).toBe("EMERGENCY");
  });

  it("rejects unknown tokens and non-strings", () => {
    expect(parseSeverity("not-a-level")).toBeUndefined();
    expect(parseSeverity("WARN")).toBeUndefined();
    expect(parseSeverity(3)).toBeUndefined();
  });

  it("prefers a valid override and falls back otherwise", () => {
    expect(resolveSeverity(LogLevel.INFO, "NOTICE")).toBe("NOTICE");
    expect(resolveSeverity(LogLevel.INFO, "not-a-level")).toBe("INFO");
    expect(resolveSeverity(LogLevel.WARN)).toBe("WARNING");
  });
});

// ============================================================================
// Special Field Routing Tests
// ============================================================================

describe("observability/special-fields", () => {
  it("pulls severity out of the generic bag", () => {
    const routed = routeFields([["severity", "NOTICE"], ["foo", 1]]);
    expect(routed.severity).toBe("NOTICE");
    expect(routed.generic).toEqual([["foo", 1]]);
  });

  it("keeps dotted severity keys generic", () => {
    const routed = routeFields([["severity.source", "user"]]);
    expect(routed.severity).toBeUndefined();
    expect(routed.generic).toEqual([["severity.source", "user"]]);
  });

  it("nests http_request fields", () => {
    const routed = routeFields([
      ["http_request.request_method", "GET"],
      ["http_request.status", 200],
    ]);
    expect(routed.httpRequest).toEqual({ requestMethod: "GET", status: 200 });
    expect(routed.generic).toEqual([]);
  });

  it("accepts http_request as a nested mapping", () => {
    const routed = routeFields([["http_request", { request_method: "POST", status: 201 }]]);
    expect(routed.httpRequest).toEqual({ requestMethod: "POST", status: 201 });
  });

  it("routes already-camelCased reserved keys", () => {
    const routed = routeFields([["httpRequest.status", 404], ["insertId", "abc"]]);
    expect(routed.httpRequest).toEqual({ status: 404 });
    expect(routed.insertId).toBe("abc");
  });

  it("stringifies label values", () => {
    const routed = routeFields([
      ["labels.number", 2],
      ["labels.boolean", false],
      ["labels.string", "a short note"],
    ]);
    expect(routed.labels).toEqual({ number: "2", boolean: "false", string: "a short note" });
  });

  it("flattens nested label mappings", () => {
    const routed = routeFields([["labels", { team_name: "core", on_call: false }]]);
    expect(routed.labels).toEqual({ teamName: "core", onCall: "false" });
  });

  it("ignores a bare labels scalar", () => {
    const routed = routeFields([["labels", "oops"]]);
    expect(routed.labels).toBeUndefined();
    expect(routed.generic).toEqual([]);
  });

  it("stringifies insert ids", () => {
    expect(routeFields([["insert_id", 123]]).insertId).toBe("123");
    expect(routeFields([["other", 1]]).insertId).toBeUndefined();
  });

  it("stringifies every value kind", () => {
    expect(stringifyValue("x")).toBe("x");
    expect(stringifyValue(1.5)).toBe("1.5");
    expect(stringifyValue(true)).toBe("true");
    expect(stringifyValue(new TypeError("bad input"))).toBe("TypeError: bad input");
    expect(stringifyValue({ a_b: 1 })).toBe('{"aB":1}');
  });
});

// ============================================================================
// Scope Projection Tests
// ============================================================================

describe("observability/span", () => {
  const scope = (name: string, fields: FieldEntry[] = []): Scope => ({ name, fields });

  it("omits span when no scope is active", () => {
    expect(projectSpan([])).toBeUndefined();
  });

  it("uses the innermost name and lets inner fields win", () => {
    const span = projectSpan([scope("A", [["x", "a"]]), scope("B", [["x", "b"]]), scope("C", [["x", "c"]])]);
    expect(span).toEqual({ name: "C", x: "c" });
  });

  it("falls back to the nearest ancestor's value", () => {
    expect(projectSpan([scope("A", [["x", "a"]]), scope("B", [["x", "b"]]), scope("C")])).toEqual({
      name: "C",
      x: "b",
    });
    expect(projectSpan([scope("A", [["x", "a"]]), scope("B"), scope("C")])).toEqual({ name: "C", x: "a" });
  });

  it("merges nested scope fields", () => {
    const span = projectSpan([scope("outer", [["db.host", "a"]]), scope("inner", [["db.port", 5432]])]);
    expect(span).toEqual({ name: "inner", db: { host: "a", port: 5432 } });
  });

  it("keeps the scope name over a field called name", () => {
    expect(projectSpan([scope("job", [["name", "shadowed"]])])).toEqual({ name: "job" });
  });
});

// ============================================================================
// Trace Correlation Tests
// ============================================================================

describe("observability/trace", () => {
  const enabled = { mode: "enabled", projectId: "demo" } as const;

  it("builds the trace resource name", () => {
    const fields = traceFields(enabled, { traceId: "0679686673a", spanId: "b7ad6b7169203331", sampled: true });
    expect(fields).toEqual({
      [TRACE_KEY]: "projects/demo/traces/0679686673a",
      [SPAN_ID_KEY]: "b7ad6b7169203331",
      [TRACE_SAMPLED_KEY]: true,
    });
  });

  it("omits everything when disabled or without a trace", () => {
    expect(traceFields({ mode: "disabled" }, { traceId: "0679686673a", sampled: true })).toEqual({});
    expect(traceFields(enabled, undefined)).toEqual({});
    expect(traceFields(enabled, { traceId: "00000000", sampled: false })).toEqual({});
  });

  it("uses the all-zero span id when the trace has no span", () => {
    const fields = traceFields(enabled, { traceId: "abc123", sampled: false });
    expect(fields[SPAN_ID_KEY]).toBe("0000000000000000");
    expect(fields[TRACE_SAMPLED_KEY]).toBe(false);
  });

  it("pads and lowercases span ids", () => {
    expect(formatSpanId("ABC")).toBe("0000000000000abc");
    expect(formatSpanId("not-hex")).toBe("0000000000000000");
  });

  it("validates trace ids", () => {
    expect(isValidTraceId("0af7651916cd43dd8448eb211c80319c")).toBe(true);
    expect(isValidTraceId("")).toBe(false);
    expect(isValidTraceId("0000")).toBe(false);
    expect(isValidTraceId("xyz")).toBe(false);
  });
});

// ============================================================================
// Source Location Tests
// ============================================================================

describe("observability/source-location", () => {
  it("skips library frames and node internals", () => {
    const stack = [
      "Error",
      "    at captureSourceLocation (/srv/app/src/lib/observability/source-location.ts:40:10)",
      "    at Logger.emit (/srv/app/src/lib/observability/logger.ts:147:40)",
      "    at handler (/srv/app/src/routes/orders.ts:88:7)",
      "    at node:internal/process/task_queues:95:5",
    ].join("\n");

    expect(parseCallsite(stack, "/srv/app/src/lib/observability")).toEqual({
      file: "/srv/app/src/routes/orders.ts",
      line: 88,
    });
  });

  it("reports application code that lives in its own lib/observability directory", () => {
    const stack = [
      "Error",
      "    at captureSourceLocation (/srv/app/node_modules/cloud-log-formatter/src/lib/observability/source-location.ts:40:10)",
      "    at Logger.emit (/srv/app/node_modules/cloud-log-formatter/src/lib/observability/logger.ts:147:40)",
      "    at recordMetric (/srv/app/src/lib/observability/metrics.ts:12:3)",
    ].join("\n");

    expect(parseCallsite(stack, "/srv/app/node_modules/cloud-log-formatter/src/lib/observability")).toEqual({
      file: "/srv/app/src/lib/observability/metrics.ts",
      line: 12,
    });
  });

  it("locates the library from its own module", () => {
    expect(libraryDirectory()?.endsWith("/src/lib/observability")).toBe(true);
  });

  it("handles anonymous frames and file URLs", () => {
    expect(parseCallsite("Error\n    at /srv/main.ts:3:1")).toEqual({ file: "/srv/main.ts", line: 3 });
    expect(parseCallsite("Error\n    at file:///srv/worker.mjs:4:2")).toEqual({ file: "/srv/worker.mjs", line: 4 });
  });

  it("returns undefined without a usable frame", () => {
    expect(parseCallsite(undefined)).toBeUndefined();
    expect(parseCallsite("Error\n    at node:internal/main:1:1")).toBeUndefined();
  });

  it("renders the line as a string", () => {
    expect(sourceLocationFields({ file: "/srv/a.ts", line: 12 })).toEqual({
      [SOURCE_LOCATION_KEY]: { file: "/srv/a.ts", line: "12" },
    });
    expect(sourceLocationFields({ file: "/srv/a.ts" })).toEqual({
      [SOURCE_LOCATION_KEY]: { file: "/srv/a.ts" },
    });
    expect(sourceLocationFields(undefined)).toEqual({});
  });
});

// ============================================================================
// Document Assembly Tests
// ============================================================================

describe("observability/document", () => {
  it("emits only time, severity and message for a plain event", () => {
    const document = formatEvent(createEvent({ message: "hello" }));

    expect(document).toEqual({
      time: "2024-05-01T12:00:00.000Z",
      severity: "INFO",
      message: "hello",
    });
    expect(Object.keys(document)).toEqual(["time", "severity", "message"]);
  });

  it("adds the source location when present and enabled", () => {
    const event = createEvent({ message: "hello", source: { file: "/srv/app.ts", line: 12 } });

    expect(Object.keys(formatEvent(event))).toEqual(["time", "severity", SOURCE_LOCATION_KEY, "message"]);
    expect(formatEvent(event)[SOURCE_LOCATION_KEY]).toEqual({ file: "/srv/app.ts", line: "12" });
    expect(Object.keys(formatEvent(event, { includeSourceLocation: false }))).toEqual([
      "time",
      "severity",
      "message",
    ]);
  });

  it("orders every section", () => {
    const event = createEvent({
      message: "hello",
      fields: [
        ["user_name", "ann"],
        ["http_request.status", 200],
        ["labels.env", "prod"],
        ["insert_id", 17],
        ["severity", "ALERT"],
      ],
      scopes: [{ name: "req", fields: [["request_id", "r1"]] }],
      trace: { traceId: "0af7651916cd43dd8448eb211c80319c", spanId: "b7ad6b7169203331", sampled: false },
      source: { file: "/srv/app.ts", line: 3 },
    });

    const document = formatEvent(event, {
      traceCorrelation: { mode: "enabled", projectId: "demo" },
      includeTarget: true,
    });

    expect(Object.keys(document)).toEqual([
      "time",
      "target",
      "severity",
      "httpRequest",
      LABELS_KEY,
      INSERT_ID_KEY,
      TRACE_KEY,
      SPAN_ID_KEY,
      TRACE_SAMPLED_KEY,
      SOURCE_LOCATION_KEY,
      "span",
      "userName",
      "message",
    ]);
    expect(document.target).toBe("test");
    expect(document.severity).toBe("ALERT");
    expect(document[INSERT_ID_KEY]).toBe("17");
    expect(document.span).toEqual({ name: "req", requestId: "r1" });
  });

  it("stringifies labels regardless of type", () => {
    const document = formatEvent(createEvent({ fields: [["labels.foo", 3], ["labels.bar", true]] }));
    expect(document[LABELS_KEY]).toEqual({ foo: "3", bar: "true" });
  });

  it("merges http_request fields into one object", () => {
    const document = formatEvent(
      createEvent({
        fields: [
          ["http_request.request_method", "GET"],
          ["http_request.request_url", "/x"],
        ],
      })
    );
    expect(document.httpRequest).toEqual({ requestMethod: "GET", requestUrl: "/x" });
  });

  it("applies and drops a severity override", () => {
    const notice = formatEvent(createEvent({ fields: [["severity", "NOTICE"]] }));
    expect(notice.severity).toBe("NOTICE");
    expect(Object.keys(notice)).toEqual(["time", "severity"]);

    const invalid = formatEvent(createEvent({ fields: [["severity", "not-a-level"]] }));
    expect(invalid.severity).toBe("INFO");
    expect(Object.keys(invalid)).toEqual(["time", "severity"]);
  });

  it("omits span without scopes and trace fields without correlation", () => {
    const document = formatEvent(
      createEvent({ trace: { traceId: "0679686673a", sampled: true } }),
      { traceCorrelation: { mode: "disabled" } }
    );
    expect(document).not.toHaveProperty("span");
    expect(document).not.toHaveProperty([TRACE_KEY]);
  });

  it("builds the trace key when correlation is enabled", () => {
    const document = formatEvent(createEvent({ trace: { traceId: "0679686673a", sampled: true } }), {
      traceCorrelation: { mode: "enabled", projectId: "demo" },
    });
    expect(document[TRACE_KEY]).toBe("projects/demo/traces/0679686673a");
    expect(document[SPAN_ID_KEY]).toBe("0000000000000000");
    expect(document[TRACE_SAMPLED_KEY]).toBe(true);
  });

  it("uses a message field when the event has no message", () => {
    const fromField = formatEvent(createEvent({ fields: [["message", "from field"]] }));
    expect(fromField.message).toBe("from field");
    expect(Object.keys(fromField)).toEqual(["time", "severity", "message"]);

    const explicit = formatEvent(createEvent({ message: "explicit", fields: [["message", "from field"]] }));
    expect(explicit.message).toBe("explicit");
  });

  it("does not let generic fields replace document keys", () => {
    const document = formatEvent(createEvent({ fields: [["time", "yesterday"], ["span", "x"], ["target", "t"]] }));
    expect(document).toEqual({ time: "2024-05-01T12:00:00.000Z", severity: "INFO", target: "t" });

    const withTarget = formatEvent(createEvent({ fields: [["target", "t"]] }), { includeTarget: true });
    expect(withTarget.target).toBe("test");
  });

  it("serializes one newline-terminated line", () => {
    const line = formatEventLine(createEvent({ message: "hi" }), { includeSourceLocation: false });
    expect(line).toBe('{"time":"2024-05-01T12:00:00.000Z","severity":"INFO","message":"hi"}\n');
  });

  it("keeps time first when a field key looks like an integer", () => {
    const line = formatEventLine(createEvent({ message: "m", fields: [["404", "not found count"]] }));
    expect(line).toBe('{"time":"2024-05-01T12:00:00.000Z","severity":"INFO","404":"not found count","message":"m"}\n');
  });

  it("writes generic fields in the order they were supplied", () => {
    const line = formatEventLine(createEvent({ fields: [["b", 1], ["404", 2], ["a.x", 3], ["b", 4]] }));
    expect(line).toBe('{"time":"2024-05-01T12:00:00.000Z","severity":"INFO","b":4,"404":2,"a":{"x":3}}\n');
  });

  it("lists the same entries from buildDocument", () => {
    expect(buildDocument(createEvent({ message: "m", fields: [["7", true]] }))).toEqual([
      ["time", "2024-05-01T12:00:00.000Z"],
      ["severity", "INFO"],
      ["7", true],
      ["message", "m"],
    ]);
  });

  it("produces stable canonical output for the same event", () => {
    const event = createEvent({
      message: "hello",
      fields: [["b_key", 1], ["a_key", { z: true, y: "n" }], ["labels.k", 2]],
      scopes: [{ name: "s", fields: [["q", 1]] }],
    });

    const first = canonicalize(JSON.parse(formatEventLine(event)));
    const second = canonicalize(JSON.parse(formatEventLine(event)));
    expect(first).toBe(second);
    expect(first).toBe(
      '{"aKey":{"y":"n","z":true},"bKey":1,"logging.googleapis.com/labels":{"k":"2"},"message":"hello","severity":"INFO","span":{"name":"s","q":1},"time":"2024-05-01T12:00:00.000Z"}'
    );
  });
});

// ============================================================================
// Test Helpers
// ============================================================================

function createEvent(overrides: Partial<LogEvent> = {}): LogEvent {
  return {
    level: LogLevel.INFO,
    target: "test",
    timestamp: new Date("2024-05-01T12:00:00.000Z"),
    fields: [],
    scopes: [],
    ...overrides,
  };
}

/**
 * Re-serialize parsed JSON with object keys sorted.
 */
function canonicalize(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(canonicalize).join(",")}]`;
  }
  if (value !== null && typeof value === "object") {
    const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `{${entries.map(([key, child]) => `${JSON.stringify(key)}:${canonicalize(child)}`).join(",")}}`;
  }
  return JSON.stringify(value);
}
