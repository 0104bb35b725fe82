// Command output goes to stdout; diagnostics go through the logger (stderr)

export function print(line: string = ''): void {
  process.stdout.write(line + '\n');
}
