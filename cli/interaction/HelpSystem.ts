export class HelpSystem {
  displayHelp(): void {
    console.log(`
Usage: fragmerge [options] <file|directory>...

Merge fragments joined by #include <name> directives into one source.
Every file is registered under its base name; directories contribute the files
directly inside them whose extension is configured. Exactly one fragment must
not be included by any other: its merged text is the output.

Options:
  -o, --output <file>       Write the merged source to a file (default: stdout)
  -e, --ext <list>          Comma-separated extensions to load from directories
  --skip-block-comments     Ignore directives inside /* ... */ comments
  --order                   Print the processing order instead of merging
  -v, --verbose             Show progress information
  -d, --debug               Show debug output
  -h, --help                Display this help message
  -V, --version             Display the version

Configuration:
  ./fragmerge.config.json and ~/.config/fragmerge.json may set
  "extensions", "skipBlockComments", "maxFragmentSize" and "output".

Examples:
  fragmerge shaders/ -o build/main.frag
  fragmerge main.frag lighting.glsl noise.glsl
  fragmerge --order shaders/
    `);
  }
}
