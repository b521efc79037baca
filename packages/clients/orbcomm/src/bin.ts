#!/usr/bin/env -S node --import tsx
import { cli } from "./cli.js";

process.exitCode = await cli();
