/** Texto del frente: la segunda palabra del nombre, o el nombre entero si tiene una sola. */
export function frontTitle(name: string): string {
  const words = name.split(/\s+/).filter((w) => w.length > 0);
  return words.length > 1 ? words[1] : name;
}
