export enum SplitMode {
    Before,
    After,
}

/**
 * 只读、可按下标访问的序列，数组与 TypedArray 均可
 */
export type SequenceView<T> = ArrayLike<T>;

export type Predicate<T> = (element: T, index: number) => boolean;

export interface SplitOptions {
    /** 每产出一段就用 `console.log` 打印 */
    debug?: boolean;
}
