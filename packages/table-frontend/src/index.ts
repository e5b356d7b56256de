export type {
  CellScalar,
  ColumnInfo,
  ColumnType,
  FilterViewResult,
  QueryRowsResult,
  SortColumn,
  TableEngine,
  TableRow
} from "./engine";
export { InvalidFilterError, TableOperationError, UnknownColumnError, UnknownTableError } from "./errors";
export type { TableOperation } from "./errors";
export {
  FILTER_OPERATORS,
  describeFilterCondition,
  filterConditionSchema,
  filterConditionsSchema,
  filterOperatorSchema,
  parseFilterConditions,
  parseFilterRules,
  parseFilterValue
} from "./filters";
export type { FilterCondition, FilterOperator, FilterRuleInput, FilterScalar } from "./filters";
export { EngineTableProvider } from "./provider";
export { InMemoryTableEngine, compareScalars, likePatternToRegExp, matchesCondition } from "./memoryEngine";
export type { InMemoryTableEngineOptions } from "./memoryEngine";
export { TableWorkbench, formatRowCount } from "./workbench";
export type { RowWindowTarget, TableWorkbenchOptions, TableWorkbenchState } from "./workbench";
