#!/usr/bin/env node

import { defineCommand, runMain } from "citty"

import { start } from "./start"

const main = defineCommand({
  meta: {
    name: "polylisten",
    description: "Serve HTTP on TCP, Unix sockets or systemd-activated sockets",
  },
  subCommands: { serve: start },
})

void runMain(main)
