export function splitRemotePath(entryPath: string): { dir: string; name: string } {
  const idx = entryPath.lastIndexOf("/");
  if (idx < 0) return { dir: "/", name: entryPath };
  const dir = idx === 0 ? "/" : entryPath.slice(0, idx);
  return { dir, name: entryPath.slice(idx + 1) };
}

export function joinRemotePath(dir: string, name: string): string {
  if (dir === "/" || dir === "") return `/${name}`;
  return `${dir.replace(/\/+$/, "")}/${name}`;
}
