#!/usr/bin/env node
/**
 * Entry point of the `kubectl-chronicle` plugin
 */
import { run } from './main.js'

void run(process.argv.slice(2))
