import { isEqual, slice } from "lodash-es";
import type { SequenceView } from "./type";

/**
 * 源序列中 `[start, end)` 的一段，只保存引用与下标，不复制元素
 */
export class RunView<T> implements Iterable<T> {

    constructor(
        public readonly source: SequenceView<T>,
        public readonly start: number,
        public readonly end: number,
    ) {

    }

    get length() {
        return this.end - this.start;
    }

    at(index: number): T | undefined {
        const relative = Math.trunc(index) || 0;
        const offset = relative < 0 ? this.length + relative : relative;
        if (offset < 0 || offset >= this.length) return undefined;
        return this.source[this.start + offset];
    }

    *[Symbol.iterator](): Iterator<T> {
        for (let i = this.start; i < this.end; i++) {
            yield this.source[i];
        }
    }

    /**
     * 复制为普通数组
     */
    toArray(): T[] {
        return slice(this.source, this.start, this.end);
    }

    equals(other: ArrayLike<T>) {
        if (other.length !== this.length) return false;
        for (let i = 0; i < this.length; i++) {
            if (!isEqual(this.source[this.start + i], other[i])) return false;
        }
        return true;
    }
}
