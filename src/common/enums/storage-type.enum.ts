export enum StorageType {
  LOCAL = 'local',
  CLOUD = 'cloud',
}
