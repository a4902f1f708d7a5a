export type ParseFailure = { success: false; error: string };

export type ParseResult<T> = { success: true; data: T } | ParseFailure;

export const accepted = <T>(data: T): ParseResult<T> => ({ success: true, data });

export const rejected = (error: string): ParseFailure => ({ success: false, error });
