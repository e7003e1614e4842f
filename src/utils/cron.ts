import { ScheduleParseError } from "../errors";

import type { FieldBounds, FieldExpression, ScheduleFieldName, ScheduleSpec } from "../types/schedule";

export const FIELD_BOUNDS: Record<ScheduleFieldName, FieldBounds> = {
  minute: { min: 0, max: 59 },
  hour: { min: 0, max: 23 },
  dayOfMonth: { min: 1, max: 31 },
  month: { min: 1, max: 12 },
  // 0 and 7 both mean Sunday
  dayOfWeek: { min: 0, max: 7 },
};

export const FIELD_ORDER: readonly ScheduleFieldName[] = ["minute", "hour", "dayOfMonth", "month", "dayOfWeek"];

const FIELD_LABELS: Record<ScheduleFieldName, string> = {
  minute: "minute",
  hour: "hour",
  dayOfMonth: "day-of-month",
  month: "month",
  dayOfWeek: "day-of-week",
};

const DIGITS = /^\d+$/;
const STEP = /^\*\/(\d+)$/;
const RANGE = /^(\d+)-(\d+)$/;

function parseValue(text: string, field: string, bounds: FieldBounds): number {
  if (!DIGITS.test(text)) {
    throw new ScheduleParseError(field, `'${text}' is not a number`);
  }
  // parseInt drops leading zeros, so "05" and "5" are the same value
  const value = parseInt(text, 10);
  if (value < bounds.min || value > bounds.max) {
    throw new ScheduleParseError(field, `${value} is outside ${bounds.min}-${bounds.max}`);
  }
  return value;
}

/**
 * Parses a single cron-style field. Supported forms are `*`, `*\/n`, `a-b`,
 * comma lists of plain values and a plain value.
 *
 * @throws ScheduleParseError when the text fits none of the forms or a value is out of bounds
 */
export function parseField(text: string, bounds: FieldBounds): FieldExpression {
  const field = text.trim();

  if (field === "*") {
    return { kind: "wildcard" };
  }

  const stepMatch = STEP.exec(field);
  if (stepMatch) {
    const step = parseInt(stepMatch[1], 10);
    if (step === 0) {
      throw new ScheduleParseError(field, "step must be greater than zero");
    }
    return { kind: "step", step };
  }

  const rangeMatch = RANGE.exec(field);
  if (rangeMatch) {
    const start = parseValue(rangeMatch[1], field, bounds);
    const end = parseValue(rangeMatch[2], field, bounds);
    if (start > end) {
      throw new ScheduleParseError(field, `range start ${start} is greater than end ${end}`);
    }
    return { kind: "range", start, end };
  }

  if (field.includes(",")) {
    const values = field.split(",").map((part) => parseValue(part.trim(), field, bounds));
    return { kind: "list", values };
  }

  if (DIGITS.test(field)) {
    return { kind: "literal", value: parseValue(field, field, bounds) };
  }

  throw new ScheduleParseError(field, "unsupported field syntax");
}

export function matchesField(expression: FieldExpression, value: number): boolean {
  switch (expression.kind) {
    case "wildcard":
      return true;
    case "step":
      // Steps count from zero, not from the field minimum
      return value % expression.step === 0;
    case "range":
      return value >= expression.start && value <= expression.end;
    case "list":
      return expression.values.includes(value);
    case "literal":
      return value === expression.value;
  }
}

/**
 * Evaluates raw field text against a sampled time component. Malformed text
 * never matches.
 */
export function matchesFieldText(text: string, value: number | string, min: number, max: number): boolean {
  const current = typeof value === "number" ? value : Number(value.trim());
  if (!Number.isInteger(current)) {
    return false;
  }

  let expression: FieldExpression;
  try {
    expression = parseField(text, { min, max });
  } catch {
    return false;
  }
  return matchesField(expression, current);
}

export function matchesDayOfWeek(expression: FieldExpression, value: number): boolean {
  const day = value === 7 ? 0 : value;
  return matchesField(expression, day) || (day === 0 && matchesField(expression, 7));
}

export function parseSchedule(expression: string): ScheduleSpec {
  const parts = expression.trim().split(/\s+/).filter((part) => part.length > 0);
  if (parts.length !== FIELD_ORDER.length) {
    throw new ScheduleParseError(expression, `expected 5 fields, got ${parts.length}`);
  }

  const parsed = FIELD_ORDER.map((name, index) => {
    try {
      return parseField(parts[index], FIELD_BOUNDS[name]);
    } catch (error) {
      if (error instanceof ScheduleParseError) {
        throw new ScheduleParseError(expression, `${FIELD_LABELS[name]} field ${error.reason}`);
      }
      throw error;
    }
  });

  return {
    expression: parts.join(" "),
    minute: parsed[0],
    hour: parsed[1],
    dayOfMonth: parsed[2],
    month: parsed[3],
    dayOfWeek: parsed[4],
  };
}

/**
 * Day-of-month and day-of-week must both match. Classic cron ORs them when
 * both are restricted; this evaluator does not.
 */
export function isDue(spec: ScheduleSpec, now: Date): boolean {
  return (
    matchesField(spec.minute, now.getMinutes()) &&
    matchesField(spec.hour, now.getHours()) &&
    matchesField(spec.dayOfMonth, now.getDate()) &&
    matchesField(spec.month, now.getMonth() + 1) &&
    matchesDayOfWeek(spec.dayOfWeek, now.getDay())
  );
}

function describeField(expression: FieldExpression): string {
  switch (expression.kind) {
    case "wildcard":
      return "every";
    case "step":
      return `every ${expression.step}`;
    case "range":
      return `${expression.start}-${expression.end}`;
    case "list":
      return expression.values.join(",");
    case "literal":
      return String(expression.value);
  }
}

export function describeSchedule(spec: ScheduleSpec): string {
  return FIELD_ORDER.map((name) => `${FIELD_LABELS[name]}: ${describeField(spec[name])}`).join(", ");
}

/** Local-time minute marker, `YYYYMMDDHHmm`. */
export function formatMinuteMarker(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `${pad(date.getHours())}${pad(date.getMinutes())}`
  );
}
