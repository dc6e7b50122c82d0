import pc from "picocolors";

// stdout is reserved for the commit message; everything else goes to stderr.
let verbose = process.env.DIFFSCRIBE_DEBUG === "1";

export function setVerbose(on: boolean) {
  verbose = on;
}

export const log = {
  info: (msg: string) => console.error(pc.cyan("ℹ"), msg),
  ok: (msg: string) => console.error(pc.green("✔"), msg),
  warn: (msg: string) => console.error(pc.yellow("⚠"), msg),
  err: (msg: string) => console.error(pc.red("✖"), msg),
  step: (msg: string) => console.error(pc.magenta("▶"), msg),
  debug: (msg: string) => {
    if (verbose) console.error(pc.dim("·"), pc.dim(msg));
  },
};
