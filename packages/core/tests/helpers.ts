/** Clock that advances one second per call, starting at `start` */
export function steppingClock(start = '2026-03-01T10:00:00.000Z'): () => Date {
  let ms = Date.parse(start);
  return () => {
    const d = new Date(ms);
    ms += 1000;
    return d;
  };
}
