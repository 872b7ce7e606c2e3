// "__" is the separator marker, so literal double underscores are lengthened first.
export function mapName(name: string): string {
  return name.replaceAll("__", "___").replaceAll("/", "__");
}
