// Runs before each test file: keep the engine's logs out of test output

import { configure } from "@logtape/logtape"

await configure({
  reset: true,
  sinks: {},
  loggers: [
    {
      category: ["riffline"],
      lowestLevel: "fatal",
      sinks: [],
    },
    {
      category: ["logtape", "meta"],
      lowestLevel: "warning",
      sinks: [],
    },
  ],
})
