/**
 * Where program output goes. `print` and shell lines write through it.
 */
export interface OutputSink {
    write(text: string): void;
    error(text: string): void;
}

export const processOutput: OutputSink = {
    write: (text) => {
        process.stdout.write(text);
    },
    error: (text) => {
        process.stderr.write(text);
    },
};
