#!/usr/bin/env node

/**
 * modbus-pdu CLI – build Modbus request PDUs and inspect response PDUs.
 */

import { createProgram } from "./program.js";

createProgram().parse();
