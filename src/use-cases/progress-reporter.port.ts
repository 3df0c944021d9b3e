export interface ProgressReporter {
    info(message: string): void;
    warn(message: string): void;
}

export type Sleep = (ms: number) => Promise<void>;
