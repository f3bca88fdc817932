// pattern: Functional Core
// sh scripts standing in for a compiler and the program it builds

/**
 * A built program that prints usage for --help and fails otherwise
 */
export const HELP_ONLY_ARTIFACT = `#!/bin/sh
if [ "$1" = "--help" ]; then
  echo "usage: retrodep [flags] <path>"
  exit 0
fi
echo "unknown invocation: $*" >&2
exit 2
`;

export interface FakeToolchainOptions {
  /** Exit status of the fake build, default 0 */
  exitCode?: number;
  /** Line written to stderr before exiting */
  stderr?: string;
  /** What ends up at the -o path, default an executable */
  artifact?: "executable" | "not-executable" | "none";
  /** sh source of the produced program */
  artifactScript?: string;
}

function singleQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/**
 * Renders a toolchain stand-in invoked as `<script> build -o <output>`.
 * It echoes its working directory and the dependency variables it sees.
 */
export function fakeToolchainScript(options: FakeToolchainOptions = {}): string {
  const artifact = options.artifact ?? "executable";
  const lines = [
    "#!/bin/sh",
    'out=""',
    'while [ $# -gt 0 ]; do',
    '  if [ "$1" = "-o" ]; then out="$2"; shift; fi',
    "  shift",
    "done",
    'echo "cwd=$(pwd)"',
    'echo "GOFLAGS=$GOFLAGS"',
    'echo "GOPROXY=$GOPROXY"',
  ];

  if (options.stderr !== undefined) {
    lines.push(`echo ${singleQuote(options.stderr)} >&2`);
  }

  if (artifact !== "none") {
    lines.push(
      `cat > "$out" <<'ARTIFACT'`,
      (options.artifactScript ?? HELP_ONLY_ARTIFACT).trimEnd(),
      "ARTIFACT"
    );
    lines.push(
      artifact === "executable" ? 'chmod 755 "$out"' : 'chmod 644 "$out"'
    );
  }

  lines.push(`exit ${options.exitCode ?? 0}`);
  return `${lines.join("\n")}\n`;
}
