export type FieldExpression =
  | { kind: "wildcard" }
  | { kind: "step"; step: number }
  | { kind: "range"; start: number; end: number }
  | { kind: "list"; values: number[] }
  | { kind: "literal"; value: number };

export type ScheduleFieldName = "minute" | "hour" | "dayOfMonth" | "month" | "dayOfWeek";

export interface FieldBounds {
  min: number;
  max: number;
}

export interface ScheduleSpec {
  expression: string;
  minute: FieldExpression;
  hour: FieldExpression;
  dayOfMonth: FieldExpression;
  month: FieldExpression;
  dayOfWeek: FieldExpression;
}
