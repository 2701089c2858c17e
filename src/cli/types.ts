// Options shared by the process inspection commands.
export interface ProcessCommandOptions {
  executable?: string;
  json?: boolean;
}
