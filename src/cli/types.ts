export enum OutputFormat {
  Line = "line",
  Json = "json",
}
