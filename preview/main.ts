import { splitAfter, splitBefore } from "../src";

const NEWLINE = 0x0a;

const buffer = new Uint8Array(5000000);
for (let i = 0; i < buffer.length; i++) {
    buffer[i] = i % 97 === 0 ? NEWLINE : 0x61 + (i % 26);
}

console.time("splitBefore");
let lines = 0;
for (const _run of splitBefore(buffer, (byte) => byte === NEWLINE)) {
    lines++;
}
console.timeEnd("splitBefore");
console.log(`splitBefore: ${lines} runs`);

console.time("splitAfter");
let longest = 0;
for (const run of splitAfter(buffer, (byte) => byte === NEWLINE)) {
    longest = Math.max(longest, run.length);
}
console.timeEnd("splitAfter");
console.log(`splitAfter: longest run ${longest}`);

for (const run of splitBefore([0, 1, 2, 3, 4, 5, 6, 7, 8], (v) => v === 2 || v === 5, { debug: true })) {
    console.log(run.toArray());
}
