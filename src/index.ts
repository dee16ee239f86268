#!/usr/bin/env node
import { handleFatal, main } from "./cli.js";

// exitCode rather than process.exit so the log transport can flush
main()
  .catch(handleFatal)
  .then((code) => {
    process.exitCode = code;
  });
