/**
 * @spanwise/tracing - Propagation tests
 */

import { describe, it, expect } from "vitest";
import { HeadersCarrier, RecordCarrier, toCarrier } from "../src/carrier.js";
import { createTraceContext } from "../src/context.js";
import {
  NoopPropagator,
  W3CTraceContextPropagator,
  formatTraceparent,
  parseTraceparent,
} from "../src/propagation.js";

const TRACE_ID = "4bf92f3577b34da6a3ce929d0e0e4736";
const SPAN_ID = "00f067aa0ba902b7";

describe("parseTraceparent", () => {
  it("should parse a valid version 00 header", () => {
    const ctx = parseTraceparent(`00-${TRACE_ID}-${SPAN_ID}-01`);

    expect(ctx).toEqual({
      traceId: TRACE_ID,
      spanId: SPAN_ID,
      traceFlags: 1,
      isRemote: true,
      traceState: undefined,
    });
  });

  it("should keep only the sampled flag", () => {
    expect(parseTraceparent(`00-${TRACE_ID}-${SPAN_ID}-02`)?.traceFlags).toBe(0);
    expect(parseTraceparent(`01-${TRACE_ID}-${SPAN_ID}-09`)?.traceFlags).toBe(1);
  });

  it("should reject uppercase hex", () => {
    expect(parseTraceparent(`00-${TRACE_ID.toUpperCase()}-${SPAN_ID}-01`)).toBeUndefined();
    expect(parseTraceparent(`00-${TRACE_ID}-${SPAN_ID}-0A`)).toBeUndefined();
  });

  it("should reject version ff", () => {
    expect(parseTraceparent(`ff-${TRACE_ID}-${SPAN_ID}-01`)).toBeUndefined();
  });

  it("should reject extra fields on version 00", () => {
    expect(parseTraceparent(`00-${TRACE_ID}-${SPAN_ID}-01-extra`)).toBeUndefined();
  });

  it("should accept extra fields on later versions", () => {
    const ctx = parseTraceparent(`01-${TRACE_ID}-${SPAN_ID}-01-extra`);
    expect(ctx?.traceId).toBe(TRACE_ID);
    expect(ctx?.spanId).toBe(SPAN_ID);
  });

  it("should reject version 00 flags above 02", () => {
    expect(parseTraceparent(`00-${TRACE_ID}-${SPAN_ID}-03`)).toBeUndefined();
  });

  it("should reject all-zero identifiers", () => {
    expect(parseTraceparent(`00-${"0".repeat(32)}-${SPAN_ID}-01`)).toBeUndefined();
    expect(parseTraceparent(`00-${TRACE_ID}-${"0".repeat(16)}-01`)).toBeUndefined();
  });

  it("should reject malformed input", () => {
    expect(parseTraceparent("")).toBeUndefined();
    expect(parseTraceparent("garbage")).toBeUndefined();
    expect(parseTraceparent(`00-${TRACE_ID.slice(1)}-${SPAN_ID}-01`)).toBeUndefined();
    expect(parseTraceparent(`00-${TRACE_ID}-${SPAN_ID}-1`)).toBeUndefined();
  });
});

describe("formatTraceparent", () => {
  it("should format as version 00", () => {
    const ctx = createTraceContext({ traceId: TRACE_ID, spanId: SPAN_ID, traceFlags: 1 });
    expect(formatTraceparent(ctx)).toBe(`00-${TRACE_ID}-${SPAN_ID}-01`);
  });

  it("should pad unsampled flags", () => {
    const ctx = createTraceContext({ traceId: TRACE_ID, spanId: SPAN_ID, traceFlags: 0 });
    expect(formatTraceparent(ctx)).toBe(`00-${TRACE_ID}-${SPAN_ID}-00`);
  });
});

describe("W3CTraceContextPropagator", () => {
  const propagator = new W3CTraceContextPropagator();

  it("should list its fields", () => {
    expect(propagator.fields()).toEqual(["traceparent", "tracestate"]);
  });

  it("should extract regardless of header case", () => {
    const carrier = new RecordCarrier({
      Traceparent: `00-${TRACE_ID}-${SPAN_ID}-01`,
      TraceState: "vendor=opaque,other=1",
    });

    const ctx = propagator.extract(carrier);

    expect(ctx?.traceId).toBe(TRACE_ID);
    expect(ctx?.spanId).toBe(SPAN_ID);
    expect(ctx?.isRemote).toBe(true);
    expect(ctx?.traceState).toBe("vendor=opaque,other=1");
  });

  it("should return undefined without a traceparent", () => {
    expect(propagator.extract(new RecordCarrier({ tracestate: "vendor=opaque" }))).toBeUndefined();
  });

  it("should return undefined for a malformed traceparent", () => {
    expect(propagator.extract(new RecordCarrier({ traceparent: "00-xyz" }))).toBeUndefined();
  });

  it("should return a frozen context", () => {
    const ctx = propagator.extract(new RecordCarrier({ traceparent: `00-${TRACE_ID}-${SPAN_ID}-01` }));
    expect(Object.isFrozen(ctx)).toBe(true);
  });

  it("should inject traceparent and tracestate", () => {
    const headers = new Headers();
    const ctx = createTraceContext({
      traceId: TRACE_ID,
      spanId: SPAN_ID,
      traceFlags: 1,
      traceState: "vendor=opaque",
    });

    propagator.inject(ctx, new HeadersCarrier(headers));

    expect(headers.get("traceparent")).toBe(`00-${TRACE_ID}-${SPAN_ID}-01`);
    expect(headers.get("tracestate")).toBe("vendor=opaque");
  });

  it("should not write tracestate when absent", () => {
    const headers = new Headers();
    propagator.inject(createTraceContext({ traceId: TRACE_ID, spanId: SPAN_ID }), new HeadersCarrier(headers));
    expect(headers.has("tracestate")).toBe(false);
  });
});

describe("NoopPropagator", () => {
  it("should neither extract nor inject", () => {
    const propagator = new NoopPropagator();
    const record: Record<string, string> = { traceparent: `00-${TRACE_ID}-${SPAN_ID}-01` };
    const carrier = new RecordCarrier(record);

    expect(propagator.extract(carrier)).toBeUndefined();
    propagator.inject(createTraceContext(), new RecordCarrier({}));
    expect(propagator.fields()).toEqual([]);
  });
});

describe("Carriers", () => {
  it("RecordCarrier should return the first of repeated values", () => {
    const carrier = new RecordCarrier({ "x-forwarded-for": ["10.0.0.1", "10.0.0.2"] });
    expect(carrier.get("X-Forwarded-For")).toBe("10.0.0.1");
  });

  it("RecordCarrier should replace existing keys of any case", () => {
    const record: Record<string, string | string[] | undefined> = { TraceParent: "old" };
    const carrier = new RecordCarrier(record);

    carrier.set("traceparent", "new");

    expect(record).toEqual({ traceparent: "new" });
    expect(carrier.keys()).toEqual(["traceparent"]);
  });

  it("RecordCarrier should skip undefined values in keys", () => {
    const carrier = new RecordCarrier({ host: "localhost", cookie: undefined });
    expect(carrier.keys()).toEqual(["host"]);
  });

  it("HeadersCarrier should be case-insensitive", () => {
    const carrier = new HeadersCarrier(new Headers({ "User-Agent": "test-agent" }));
    expect(carrier.get("user-agent")).toBe("test-agent");
    expect(carrier.keys()).toEqual(["user-agent"]);
  });

  it("toCarrier should pick the matching implementation", () => {
    expect(toCarrier(new Headers())).toBeInstanceOf(HeadersCarrier);
    expect(toCarrier({})).toBeInstanceOf(RecordCarrier);
  });
});
