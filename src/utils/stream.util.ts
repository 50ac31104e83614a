/**
 * 读完整个流并按 UTF-8 解码。
 * 先拼 Buffer 再解码，避免多字节字符被 chunk 边界截断。
 */
export async function read_stream(stream: AsyncIterable<string | Uint8Array>): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : Buffer.from(chunk));
  }
  return Buffer.concat(chunks).toString('utf8');
}
