import { z } from "zod";
import { InvalidFilterError } from "./errors";

export const FILTER_OPERATORS = ["=", "!=", ">", "<", ">=", "<=", "LIKE", "IN"] as const;

export const filterOperatorSchema = z.enum(FILTER_OPERATORS);

const filterScalarSchema = z.union([z.string().min(1, "Filter value is required"), z.number().finite(), z.boolean()]);

export const filterConditionSchema = z
  .object({
    column: z.string().trim().min(1, "Column is required"),
    operator: filterOperatorSchema,
    value: z.union([filterScalarSchema, z.array(filterScalarSchema).min(1, "IN needs at least one value")])
  })
  .superRefine((condition, ctx) => {
    const isList = Array.isArray(condition.value);
    if (condition.operator === "IN" && !isList) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["value"], message: "IN expects a list of values" });
    } else if (condition.operator !== "IN" && isList) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["value"], message: `${condition.operator} expects a single value` });
    } else if (condition.operator === "LIKE" && typeof condition.value !== "string") {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["value"], message: "LIKE expects a text pattern" });
    }
  });

export const filterConditionsSchema = z.array(filterConditionSchema).min(1, "Add at least one filter rule");

export type FilterOperator = z.infer<typeof filterOperatorSchema>;
export type FilterScalar = z.infer<typeof filterScalarSchema>;
export type FilterCondition = z.infer<typeof filterConditionSchema>;

/** A rule as typed into the filter dialog: every value is still text. */
export interface FilterRuleInput {
  column: string;
  operator: FilterOperator;
  value: string;
}

/**
 * Numbers win only when the text is exactly what the number prints back as ("42", "-1.5"; not
 * "007" or "1e3"). Then `true`/`false` in any case. Anything else stays text.
 */
export function parseFilterValue(text: string): FilterScalar {
  const trimmed = text.trim();
  const num = Number.parseFloat(trimmed);
  if (!Number.isNaN(num) && trimmed === num.toString()) return num;

  const lower = trimmed.toLowerCase();
  if (lower === "true") return true;
  if (lower === "false") return false;

  return text;
}

export function parseFilterConditions(input: unknown): FilterCondition[] {
  const parsed = filterConditionsSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidFilterError(parsed.error.issues);
  }
  return parsed.data;
}

/** `IN` takes a comma separated list; blank entries are dropped. */
export function parseFilterRules(rules: readonly FilterRuleInput[]): FilterCondition[] {
  const candidates = rules.map((rule) => {
    if (rule.value.trim() === "") {
      return { column: rule.column, operator: rule.operator, value: "" };
    }
    const value =
      rule.operator === "IN"
        ? rule.value
            .split(",")
            .filter((part) => part.trim() !== "")
            .map((part) => parseFilterValue(part.trim()))
        : parseFilterValue(rule.value);
    return { column: rule.column, operator: rule.operator, value };
  });
  return parseFilterConditions(candidates);
}

export function describeFilterCondition(condition: FilterCondition): string {
  const format = (value: FilterScalar) => (typeof value === "string" ? `'${value}'` : String(value));
  const value = Array.isArray(condition.value) ? `(${condition.value.map(format).join(", ")})` : format(condition.value);
  return `${condition.column} ${condition.operator} ${value}`;
}
