import type { ProgressReporter } from '../types';

const silentProgress: ProgressReporter = {
    start: () => undefined,
    stop: () => undefined,
};

/** Runs `task` with the indicator shown; the indicator is stopped however `task` ends. */
const withProgress = async <T>(
    progress: ProgressReporter,
    message: string,
    task: () => Promise<T>,
): Promise<T> => {
    progress.start(message);
    let succeeded = false;
    try {
        const result = await task();
        succeeded = true;
        return result;
    } finally {
        progress.stop(succeeded ? `${message} done` : `${message} failed`);
    }
};

export { withProgress, silentProgress };
