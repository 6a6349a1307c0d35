import { RunSplitter } from "./splitter";
import { SplitMode } from "./type";
import type { Predicate, SequenceView, SplitOptions } from "./type";

export { RunSplitter } from "./splitter";
export { RunView } from "./run";
export { splitArray } from "./utils";
export { SplitMode } from "./type";
export type { Predicate, SequenceView, SplitOptions } from "./type";

/**
 * 在匹配元素之前切分，匹配元素作为下一段的开头
 * @example
 * const runs = [...splitBefore([0, 1, 2], (v) => v === 1)].map((run) => run.toArray());
 * // [[0], [1, 2]]
 */
export const splitBefore = <T>(source: SequenceView<T>, predicate: Predicate<T>, options?: SplitOptions) =>
    new RunSplitter(source, predicate, SplitMode.Before, options);

/**
 * 在匹配元素之后切分，匹配元素作为当前段的结尾
 * @example
 * const runs = [...splitAfter([0, 1, 2], (v) => v === 1)].map((run) => run.toArray());
 * // [[0, 1], [2]]
 */
export const splitAfter = <T>(source: SequenceView<T>, predicate: Predicate<T>, options?: SplitOptions) =>
    new RunSplitter(source, predicate, SplitMode.After, options);
