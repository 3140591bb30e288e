import type { DocumentStore, StoredDocument } from './database.js';
import { ConflictError, NotFoundError, ValidationError } from './errors.js';
import { rankByProximity, toProximityResults, type ProximityResult } from './proximity.js';
import { MatchPostRecordSchema, MessageRecordSchema, TeamRecordSchema } from './schemas.js';
import { allocateTeamId, TEAM_COLLECTION } from './team-id.js';
import type {
  HealthStatus,
  MatchPost,
  MatchPostCreateRequest,
  Message,
  MessageCreateRequest,
  NearbyRequest,
  Sport,
  Stats,
  Team,
  TeamCreateRequest,
  TeamRegistration,
  WithId
} from './types.js';

export const MATCHPOST_COLLECTION = 'matchpost';
export const MESSAGE_COLLECTION = 'message';

function withId<T extends object>(doc: StoredDocument, data: T): WithId<T> {
  return { ...data, id: doc.id, createdAt: doc.createdAt };
}

const newestFirst = (a: { createdAt: string }, b: { createdAt: string }) => b.createdAt.localeCompare(a.createdAt);
const oldestFirst = (a: { createdAt: string }, b: { createdAt: string }) => a.createdAt.localeCompare(b.createdAt);

export class MatchmakingService {
  constructor(private readonly store: DocumentStore) {}

  // Team operations
  registerTeam(request: TeamCreateRequest): TeamRegistration {
    if (request.players.length > 0) {
      const [existing] = this.store.find(TEAM_COLLECTION, { players: { in: request.players } });
      if (existing) {
        throw new ConflictError('One or more players already belong to another team');
      }
    }

    const allocation = allocateTeamId(this.store, request.sport);
    const team: Team = { ...request, teamId: allocation.teamId };
    const id = this.store.insert(TEAM_COLLECTION, team);

    return { teamId: team.teamId, id, degraded: allocation.status === 'degraded' };
  }

  listTeams(sport?: Sport): WithId<Team>[] {
    return this.store
      .find(TEAM_COLLECTION, sport ? { sport } : {})
      .map(doc => withId(doc, TeamRecordSchema.parse(doc.data)));
  }

  getTeam(teamId: string): WithId<Team> {
    const team = this.findTeam(teamId);
    if (!team) {
      throw new NotFoundError('Team not found');
    }
    return team;
  }

  private findTeam(teamId: string): WithId<Team> | undefined {
    const [doc] = this.store.find(TEAM_COLLECTION, { teamId });
    return doc ? withId(doc, TeamRecordSchema.parse(doc.data)) : undefined;
  }

  deleteTeam(teamId: string): { deleted: boolean } {
    return { deleted: this.store.deleteOne(TEAM_COLLECTION, { teamId }) };
  }

  /**
   * Teams near a point, nearest first. A center is only used when both
   * coordinates are given; otherwise every team of the sport comes back in
   * storage order. Storage failures propagate.
   */
  nearbyTeams(request: NearbyRequest): ProximityResult<WithId<Team>>[] {
    const { sport, centerLat, centerLon, radiusKm } = request;
    const teams = this.listTeams(sport);
    const center =
      centerLat !== undefined && centerLon !== undefined ? { latitude: centerLat, longitude: centerLon } : undefined;

    return toProximityResults(rankByProximity(teams, { center, radiusKm }));
  }

  // Match posts
  createMatchPost(request: MatchPostCreateRequest): { id: string } {
    const team = this.findTeam(request.teamId);
    if (!team) {
      throw new NotFoundError('Team not found');
    }

    const post: MatchPost = {
      teamId: request.teamId,
      sport: request.sport,
      numPlayers: request.numPlayers,
      timePref: request.timePref,
      note: request.note ?? null,
      locationName: team.locationName ?? null,
      latitude: team.latitude ?? null,
      longitude: team.longitude ?? null
    };

    return { id: this.store.insert(MATCHPOST_COLLECTION, post) };
  }

  feed(sport?: Sport): WithId<MatchPost>[] {
    return this.store
      .find(MATCHPOST_COLLECTION, sport ? { sport } : {})
      .map(doc => withId(doc, MatchPostRecordSchema.parse(doc.data)))
      .reverse()
      .sort(newestFirst);
  }

  // Chat
  sendMessage(request: MessageCreateRequest): { id: string } {
    const from = this.findTeam(request.fromTeamId);
    const to = this.findTeam(request.toTeamId);
    if (!from || !to) {
      throw new NotFoundError('Team not found');
    }
    if (!from.contactNumber || !to.contactNumber) {
      throw new ValidationError('Teams must complete registration to chat');
    }

    const message: Message = {
      fromTeamId: request.fromTeamId,
      toTeamId: request.toTeamId,
      text: request.text
    };

    return { id: this.store.insert(MESSAGE_COLLECTION, message) };
  }

  conversation(teamA: string, teamB: string): WithId<Message>[] {
    return this.store
      .find(MESSAGE_COLLECTION, [
        { fromTeamId: teamA, toTeamId: teamB },
        { fromTeamId: teamB, toTeamId: teamA }
      ])
      .map(doc => withId(doc, MessageRecordSchema.parse(doc.data)))
      .sort(oldestFirst);
  }

  // Admin
  stats(): Stats {
    return {
      totalTeams: this.store.count(TEAM_COLLECTION),
      totalMatchPosts: this.store.count(MATCHPOST_COLLECTION)
    };
  }

  health(): HealthStatus {
    const timestamp = new Date().toISOString();
    try {
      const collections = this.store.listCollections().slice(0, 10);
      return { status: 'healthy', database: 'connected', collections, timestamp };
    } catch (error) {
      return {
        status: 'healthy',
        database: 'unavailable',
        collections: [],
        error: error instanceof Error ? error.message : 'Unknown error',
        timestamp
      };
    }
  }
}
