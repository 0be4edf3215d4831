/** Line-oriented sink for progress and error notices; `console` satisfies it. */
export interface Logger {
    log(message: string): void;
    error(message: string): void;
}

export const silentLogger: Logger = {
    log() {},
    error() {},
};
