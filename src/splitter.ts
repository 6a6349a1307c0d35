import { RunView } from "./run";
import { SplitMode } from "./type";
import type { Predicate, SequenceView, SplitOptions } from "./type";

/**
 * 按谓词把序列切分为连续的段，每次 `nextRun` 产出一段。
 *
 * 只能单向消费一次，且假定只有一个调用方在同一线程上拉取；
 * 带状态的谓词不会被同步。
 */
export class RunSplitter<T> implements IterableIterator<RunView<T>> {

    private readonly length: number;
    private current = 0;

    constructor(
        private readonly source: SequenceView<T>,
        private readonly predicate: Predicate<T>,
        public readonly mode: SplitMode,
        private readonly options: SplitOptions = {},
    ) {
        this.length = source.length;
    }

    get cursor() {
        return this.current;
    }

    get done() {
        return this.current === this.length;
    }

    /**
     * 产出下一段，耗尽后始终返回 `undefined`
     */
    nextRun(): RunView<T> | undefined {
        if (this.done) return undefined;
        switch (this.mode) {
            case SplitMode.Before: return this.nextBefore();
            case SplitMode.After: return this.nextAfter();
        }
    }

    next(): IteratorResult<RunView<T>, undefined> {
        const run = this.nextRun();
        if (run === undefined) {
            return { done: true, value: undefined };
        }
        return { done: false, value: run };
    }

    [Symbol.iterator]() {
        return this;
    }

    private nextBefore() {
        const start = this.current;
        for (let i = start; i < this.length; i++) {
            if (this.predicate(this.source[i], i)) {
                // 段首的匹配不切分，除非它已是最后一个元素
                if (i === start && i < this.length - 1) continue;
                if (i === start) return this.emit(start, this.length);
                return this.emit(start, i);
            }
        }
        return this.emit(start, this.length);
    }

    private nextAfter() {
        const start = this.current;
        for (let i = start; i < this.length; i++) {
            if (this.predicate(this.source[i], i)) {
                return this.emit(start, i + 1);
            }
        }
        return this.emit(start, this.length);
    }

    private emit(start: number, end: number) {
        this.current = end;
        if (this.options.debug) {
            console.log("splitRun", SplitMode[this.mode], start, end);
        }
        return new RunView(this.source, start, end);
    }
}
