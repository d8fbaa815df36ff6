export type Print = (text: string) => void;

export const stdout: Print = (text) => console.log(text);

export function describeError(err: unknown): string {
  if (err instanceof Error) {
    return err.name && err.name !== 'Error' ? `${err.name}: ${err.message}` : err.message;
  }
  return String(err);
}
