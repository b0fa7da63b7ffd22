export type valueof<T> = T[keyof T];
