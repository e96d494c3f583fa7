#!/usr/bin/env node
import { hideBin } from 'yargs/helpers'
import { EXIT_FAILURE, runCli } from './app.js'
import { describeError } from './errors.js'
import { PRODUCT_NAME } from './utils/version.js'

const controller = new AbortController()

// First interrupt stops the scan and prints what was found; a second one
// gets the default behaviour and kills the process
const onSignal = (): void => controller.abort()
process.once('SIGINT', onSignal)
process.once('SIGTERM', onSignal)

runCli(hideBin(process.argv), { signal: controller.signal })
  .then((code) => {
    process.exitCode = code
  })
  .catch((err: unknown) => {
    process.stderr.write(`${PRODUCT_NAME}: ${describeError(err)}\n`)
    process.exitCode = EXIT_FAILURE
  })
  .finally(() => {
    process.off('SIGINT', onSignal)
    process.off('SIGTERM', onSignal)
  })
