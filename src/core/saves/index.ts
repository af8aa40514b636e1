export { discoverSaveSlots, findSaveSlot, slotFromId, slotIdFor } from "./discovery";
export { PLAYERS_DB, readSaveStats, THUMBNAIL_FILE, thumbnailPath } from "./stats";
export { parsePlayerData, type PlayerValue } from "./player-data";
