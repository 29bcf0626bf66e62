export default class Util {

    async wait(ms: number): Promise<void> {
        if (ms <= 0) return
        return new Promise<void>((resolve) => {
            setTimeout(resolve, ms)
        })
    }

    preview(text: string, maxChars: number): string {
        return text.length > maxChars ? `${text.slice(0, maxChars)}...` : text
    }

    formatDuration(ms: number): string {
        if (ms < 1000) return `${ms}ms`
        return `${(ms / 1000).toFixed(1)}s`
    }
}
