export function log(tag: string, msg: string): void {
  console.log(`[${tag}] ${new Date().toISOString()} - ${msg}`);
}

export function logError(tag: string, msg: string): void {
  console.error(`[${tag}] ${new Date().toISOString()} - ${msg}`);
}
