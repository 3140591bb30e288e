export const SPORTS = ['cricket', 'football', 'kabaddi', 'shuttle', 'tennis'] as const;
export type Sport = (typeof SPORTS)[number];

export const TIME_SLOTS = ['morning', 'afternoon', 'evening'] as const;
export type TimeSlot = (typeof TIME_SLOTS)[number];

export const CONTACT_PREFERENCES = ['call', 'text'] as const;
export type ContactPreference = (typeof CONTACT_PREFERENCES)[number];

export function isSport(value: string): value is Sport {
  return SPORTS.some(sport => sport === value);
}

export interface Coordinates {
  latitude: number;
  longitude: number;
}

export interface Team {
  teamId: string;
  teamName: string;
  sport: Sport;
  players: string[];
  locationName?: string | null;
  latitude?: number | null;
  longitude?: number | null;
  contactPreference: ContactPreference;
  contactNumber: string;
  availability: TimeSlot[];
}

export interface MatchPost {
  teamId: string;
  sport: Sport;
  numPlayers: number;
  timePref: TimeSlot;
  note?: string | null;
  locationName?: string | null;
  latitude?: number | null;
  longitude?: number | null;
}

export interface Message {
  fromTeamId: string;
  toTeamId: string;
  text: string;
}

// A stored document as served to clients: the storage id and creation time
// sit next to the document's own fields.
export type WithId<T> = T & {
  id: string;
  createdAt: string;
};

export type TeamCreateRequest = Omit<Team, 'teamId'>;

export type MatchPostCreateRequest = Pick<MatchPost, 'teamId' | 'sport' | 'numPlayers' | 'timePref' | 'note'>;

export type MessageCreateRequest = Message;

export interface NearbyRequest {
  sport?: Sport;
  centerLat?: number;
  centerLon?: number;
  radiusKm: number;
}

export interface TeamRegistration {
  teamId: string;
  id: string;
  degraded: boolean;
}

export interface Stats {
  totalTeams: number;
  totalMatchPosts: number;
}

export interface HealthStatus {
  status: 'healthy';
  database: 'connected' | 'unavailable';
  collections: string[];
  error?: string;
  timestamp: string;
}

export interface ApiResponse<T> {
  success: boolean;
  data?: T;
  error?: string;
  message?: string;
}
