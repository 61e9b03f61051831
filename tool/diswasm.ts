#! /usr/bin/env tsx

import {main} from '../src/cli'

main(process.argv).then(
  code => { process.exitCode = code },
  (e: unknown) => {
    console.error(e)
    process.exitCode = 1
  })
