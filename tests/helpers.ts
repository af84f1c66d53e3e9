import axios, { type AxiosInstance, type InternalAxiosRequestConfig } from "axios";
import { resolve } from "node:path";
import { InferenceEngine } from "../services/inference-service";

export const MODEL_DIR = resolve(__dirname, "..", "models");
export const FIXED_NOW = new Date("2026-03-01T08:30:00.000Z");

export function loadEngine(): InferenceEngine {
  return InferenceEngine.fromDirectory(MODEL_DIR, { now: () => FIXED_NOW });
}

export interface StubReply {
  status: number;
  data: unknown;
}

/**
 * axios instance whose requests never leave the process.
 */
export function stubHttp(reply: (config: InternalAxiosRequestConfig) => StubReply) {
  const requests: InternalAxiosRequestConfig[] = [];
  const http: AxiosInstance = axios.create({
    adapter: async (config) => {
      requests.push(config);
      const { status, data } = reply(config);
      return { data, status, statusText: String(status), headers: {}, config };
    },
  });
  return { http, requests };
}

export const SAMPLE_COMPONENTS = {
  co: 0.3,
  no: 0.1,
  no2: 5,
  o3: 15,
  so2: 1,
  pm2_5: 10,
  pm10: 20,
  nh3: 0.5,
};

export function airPollutionBody(components: Record<string, unknown>) {
  return {
    coord: { lon: 78.4867, lat: 17.385 },
    list: [{ main: { aqi: 1 }, components, dt: 1772353800 }],
  };
}
