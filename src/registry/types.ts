export interface Area {
  areaId: string;
  name: string;
}

export interface Device {
  id: string;
  name: string;
  nameByUser: string | null;
  areaId: string | null;
}

export interface Entity {
  entityId: string;
  uniqueId: string | null;
  platform: string | null;
  name: string | null;
  originalName: string | null;
  deviceId: string | null;
  areaId: string | null;
  hiddenBy: string | null;
  disabledBy: string | null;
}

export interface LiveState {
  entityId: string;
  state: string | null;
  attributes: Record<string, unknown>;
}

/** `null` clears the field on the registry side; an absent key leaves it untouched. */
export interface EntityUpdate {
  areaId?: string | null;
  name?: string | null;
  hiddenBy?: string | null;
  disabledBy?: string | null;
}

export interface DeviceUpdate {
  areaId?: string | null;
  nameByUser?: string | null;
}

export interface AreaUpdate {
  name: string;
}

export interface RegistryClient {
  listAreas(): Promise<Area[]>;
  createArea(name: string): Promise<Area>;
  updateArea(areaId: string, update: AreaUpdate): Promise<Area>;
  listDevices(): Promise<Device[]>;
  updateDevice(deviceId: string, update: DeviceUpdate): Promise<void>;
  listEntities(): Promise<Entity[]>;
  updateEntity(entityId: string, update: EntityUpdate): Promise<void>;
  removeEntity(entityId: string): Promise<void>;
  getLiveStates(): Promise<LiveState[]>;
  close(): Promise<void>;
}
