import type { RepairStatus, SelectionNotice, StallReason } from "../../services/selection/types.js";

export interface SelectedCity {
  id: string;
  name: string;
  lat: number;
  lng: number;
  population: number;
}

export interface SelectionWarningBody {
  kind: SelectionNotice["kind"];
  message: string;
}

export interface SelectionResponse {
  cities: SelectedCity[];
  requested: number;
  selected: number;
  poolSize: number;
  repair: {
    status: RepairStatus;
    iterations: number;
    reason?: StallReason;
    closestPair: { ids: [string, string]; distanceKm: number } | null;
  };
  warnings: SelectionWarningBody[];
}

export interface SelectionErrorResponse {
  error: string;
  status: 400 | 422;
  code?: string;
}
