export function byteChunks(source: Buffer) {
  const parts: Buffer[] = [];
  for (let i = 0; i < source.byteLength; ++i) {
    parts.push(source.subarray(i, i + 1));
  }
  return parts;
}

export function splitChunks(source: Buffer, chunkSize: number) {
  const parts: Buffer[] = [];
  for (let i = 0; i < source.byteLength; i += chunkSize) {
    parts.push(source.subarray(i, Math.min(i + chunkSize, source.byteLength)));
  }
  return parts;
}

export function lines(...content: string[]) {
  return Buffer.from(content.join('\r\n'), 'utf-8');
}
