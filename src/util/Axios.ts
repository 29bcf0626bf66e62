import axios, { type AxiosAdapter, type AxiosInstance, type AxiosRequestConfig, type AxiosResponse } from 'axios'

export interface AxiosClientOptions {
    timeoutMs: number
    // Replaces the network transport; used to run the client against in-process stand-ins
    adapter?: AxiosAdapter
}

/**
 * Thin wrapper around one axios instance shared by data downloads and answer submissions of an agent.
 * Every request is a single attempt: no retry, no proxy fallback.
 */
class AxiosClient {
    private instance: AxiosInstance

    constructor(options: AxiosClientOptions) {
        this.instance = axios.create({
            timeout: options.timeoutMs,
            adapter: options.adapter
        })
        // no ambient HTTP(S)_PROXY handling; requests go where the quiz says
        this.instance.defaults.proxy = false
    }

    // Generic method to make any Axios request
    public async request<T = unknown>(config: AxiosRequestConfig): Promise<AxiosResponse<T>> {
        return this.instance.request<T>(config)
    }

    public async getBytes(url: string): Promise<AxiosResponse<ArrayBuffer>> {
        return this.request<ArrayBuffer>({ method: 'GET', url, responseType: 'arraybuffer' })
    }

    public async postJson<T = unknown>(url: string, body: unknown): Promise<AxiosResponse<T>> {
        return this.request<T>({
            method: 'POST',
            url,
            data: body,
            headers: { 'Content-Type': 'application/json' }
        })
    }
}

export default AxiosClient
