import { RunSplitter } from "./splitter";
import { SplitMode } from "./type";
import type { Predicate, SequenceView } from "./type";

export const splitArray = <T>(array: SequenceView<T>, predictor: Predicate<T>, mode = SplitMode.Before) => {
    const chunks: T[][] = [];
    for (const run of new RunSplitter(array, predictor, mode)) {
        chunks.push(run.toArray());
    }
    return chunks;
}
