export type Logger = (msg: string) => void

export function printToLog(msg: string): void {
    console.log(msg)
}

export const quiet: Logger = () => undefined
