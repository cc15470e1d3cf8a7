/** Vehicle listing entry as returned by the backend's vehicles endpoint. */
export interface VehicleRecord {
  id: number;               // vehicle id used to address commands
  vehicle_id?: number;
  vin: string;
  display_name?: string | null;
  option_codes: string | null;
  state?: string;           // e.g. "online", "asleep"
}
