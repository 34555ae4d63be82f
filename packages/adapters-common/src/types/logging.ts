/** Log callback for streaming progress output */
export type LogCallback = (message: string, stream?: "stdout" | "stderr") => void;
