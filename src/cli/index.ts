#!/usr/bin/env node
import { createProgram } from './program.js'

const program = createProgram()

export { program }

await program.parseAsync()
