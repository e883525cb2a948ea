export { CriteriaBuilder } from './criteria-builder';
export type { ConcatPart, CriteriaBuilderOptions } from './criteria-builder';
export { QueryAssembler } from './query-assembler';
export { TableRoot } from './table-root';
export type { JoinWiring } from './table-root';
export { ColumnExpr, DistinctOnFragment, OrderTerm, Predicate, SelectFragment } from './fragments';
