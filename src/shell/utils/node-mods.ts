// CHANGE: Centralised re-exports of the Node built-ins the shell touches
// WHY: One import site for fs/readline keeps SHELL modules free of repeated import blocks
// PURITY: SHELL
// INVARIANT: Re-export via constants; node:fs uses `export =`, which is incompatible with `export *`

import * as fsNS from "node:fs";
import * as readlineNS from "node:readline";

export type { Readable, Writable } from "node:stream";

export const fs = fsNS;
export const readline = readlineNS;
