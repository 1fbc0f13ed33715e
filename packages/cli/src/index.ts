#!/usr/bin/env node
import { hideBin } from "yargs/helpers"
import { runCli } from "./cli"

runCli(hideBin(process.argv))
  .then((code) => {
    process.exitCode = code
  })
  .catch((err: unknown) => {
    console.error(err)
    process.exitCode = 1
  })
