export { extractPlayerIds, extractSquadDetails, type SquadPlayer } from './squadService';
