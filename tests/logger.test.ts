import {describe, it} from "node:test";
import assert from "node:assert/strict";

import {Logger, type LogLevel} from "../src/utils/logger";

function capture() {
   const lines: string[] = [];
   const raw: string[] = [];
   const sink = (level: LogLevel, line: string) => {
      raw.push(line);
      lines.push(`${level} ${line.replace(/^\[[^\]]*\] /, "")}`);
   };
   return {lines, raw, sink};
}

describe("Logger", () => {
   it("prefixes lines with a clock timestamp", () => {
      const {raw, sink} = capture();
      new Logger({sink, now: () => 0}).info("hello");
      assert.equal(raw.length, 1);
      assert.match(raw[0], /^\[\d\d:\d\d:\d\d\.\d{3}\] hello$/);
   });

   it("routes levels to the sink", () => {
      const {lines, sink} = capture();
      const log = new Logger({sink, now: () => 0});
      log.info("a");
      log.warn("b");
      log.error("c");
      assert.deepEqual(lines, ["info a", "warn b", "error c"]);
   });

   it("indents and times scopes", () => {
      const {lines, sink} = capture();
      const log = new Logger({sink, now: () => 1000});
      const r = log.scope("outer", () => {
         log.info("inner");
         return 42;
      });
      assert.equal(r, 42);
      assert.deepEqual(lines, ["info { outer", "info   inner", "info } outer (0.0ms)"]);
   });

   it("closes a failing scope and rethrows", () => {
      const {lines, sink} = capture();
      const log = new Logger({sink, now: () => 1000});
      assert.throws(() => log.scope("boom", () => {
         throw new Error("nope");
      }), /nope/);
      log.info("after");
      assert.deepEqual(lines, ["info { boom", "info } boom FAILED (0.0ms)", "info after"]);
   });

   it("begin/end reports elapsed time once", () => {
      const {lines, sink} = capture();
      let t = 100;
      const log = new Logger({sink, now: () => t, indentSize: 4});
      const s = log.begin("load");
      log.info("step");
      t = 112.5;
      s.end("ok");
      s.end();
      assert.deepEqual(lines, ["info { load", "info     step", "info } load ok (12.5ms)"]);
   });
});
