#!/usr/bin/env tsx
/**
 * Entry point for the lifeterm terminal application.
 *
 * Loads settings, switches the terminal to the alternate screen with mouse
 * reporting, and renders the root App component. The terminal is restored
 * however the session ends. Startup failures are fatal: they are printed
 * and the process exits with status 1.
 */

import React from "react";
import { render } from "ink";

import { loadSettings } from "../lib/config/index.js";
import { gridSizeFor, isUsableSize, surfaceSizeFor } from "../lib/input/mapping.js";

import { App } from "./app.js";
import { enterFullscreen } from "./lib/terminal.js";

function fail(err: unknown): never {
  const message = err instanceof Error ? err.message : String(err);
  console.error(`[lifeterm] ${message}`);
  process.exit(1);
}

function main(): void {
  const settings = loadSettings();

  if (!process.stdin.isTTY) {
    throw new Error("stdin is not a terminal; lifeterm needs raw keyboard input");
  }

  const columns = process.stdout.columns ?? 80;
  const rows = process.stdout.rows ?? 24;
  if (!isUsableSize(gridSizeFor(surfaceSizeFor(columns, rows), settings.statusWidth))) {
    throw new Error(`Terminal ${columns}x${rows} is too small`);
  }

  const restore = enterFullscreen(process.stdout);

  let instance: ReturnType<typeof render>;
  try {
    instance = render(
      <App settings={settings} columns={columns} rows={rows} />,
      { patchConsole: false },
    );
  } catch (err) {
    restore();
    throw err;
  }

  instance.waitUntilExit().then(
    () => {
      restore();
      process.exit(0);
    },
    (err: unknown) => {
      restore();
      fail(err);
    },
  );
}

try {
  main();
} catch (err) {
  fail(err);
}
