// 역할: 축구 차원(리그/팀/경기장/심판)과 fact_match 업서트 레포지토리.

import { query, type DbClient } from "../client";
import type {
  MatchFactRow,
  RefereeRow,
  SoccerLeagueRow,
  SoccerTeamRow,
  VenueRow,
} from "../../types/warehouse";

// 역할: api_league_id 기준 업서트. null 속성은 기존 값을 덮어쓰지 않는다.
export async function upsertLeague(
  row: SoccerLeagueRow,
  client?: DbClient,
): Promise<number> {
  const result = await query<{ leagueKey: number }>(
    `insert into public.dim_league (api_league_id, name, country, league_type)
     values ($1, $2, $3, $4)
     on conflict (api_league_id) do update set
       name = coalesce(excluded.name, dim_league.name),
       country = coalesce(excluded.country, dim_league.country),
       league_type = coalesce(excluded.league_type, dim_league.league_type)
     returning league_key as "leagueKey"`,
    [row.apiLeagueId, row.name, row.country, row.leagueType],
    client,
  );
  return result.rows[0].leagueKey;
}

export async function upsertTeam(
  row: SoccerTeamRow,
  client?: DbClient,
): Promise<number> {
  const result = await query<{ teamKey: number }>(
    `insert into public.dim_team
      (api_team_id, name, short_code, country, founded, stadium_name, city)
     values ($1, $2, $3, $4, $5, $6, $7)
     on conflict (api_team_id) do update set
       name = coalesce(excluded.name, dim_team.name),
       short_code = coalesce(excluded.short_code, dim_team.short_code),
       country = coalesce(excluded.country, dim_team.country),
       founded = coalesce(excluded.founded, dim_team.founded),
       stadium_name = coalesce(excluded.stadium_name, dim_team.stadium_name),
       city = coalesce(excluded.city, dim_team.city)
     returning team_key as "teamKey"`,
    [
      row.apiTeamId,
      row.name,
      row.shortCode,
      row.country,
      row.founded,
      row.stadiumName,
      row.city,
    ],
    client,
  );
  return result.rows[0].teamKey;
}

export async function upsertVenue(
  row: VenueRow,
  client?: DbClient,
): Promise<number> {
  const result = await query<{ venueKey: number }>(
    `insert into public.dim_venue (api_venue_id, name, city, capacity)
     values ($1, $2, $3, $4)
     on conflict (api_venue_id) do update set
       name = coalesce(excluded.name, dim_venue.name),
       city = coalesce(excluded.city, dim_venue.city),
       capacity = coalesce(excluded.capacity, dim_venue.capacity)
     returning venue_key as "venueKey"`,
    [row.apiVenueId, row.name, row.city, row.capacity],
    client,
  );
  return result.rows[0].venueKey;
}

// 역할: 심판은 API id가 없어서 이름을 자연키로 쓴다.
export async function upsertReferee(
  row: RefereeRow,
  client?: DbClient,
): Promise<number> {
  const result = await query<{ refereeKey: number }>(
    `insert into public.dim_referee (name, nationality)
     values ($1, $2)
     on conflict (name) do update set
       nationality = coalesce(excluded.nationality, dim_referee.nationality)
     returning referee_key as "refereeKey"`,
    [row.name, row.nationality],
    client,
  );
  return result.rows[0].refereeKey;
}

// 역할: api_match_id 기준으로 경기 팩트를 업서트한다.
export async function upsertMatch(
  row: MatchFactRow,
  client?: DbClient,
): Promise<number> {
  const result = await query<{ matchKey: number }>(
    `insert into public.fact_match
      (api_match_id, league_key, season, date_key, venue_key, referee_key,
       home_team_key, away_team_key, home_goals, away_goals,
       attendance, possession_home, possession_away, status)
     values ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14)
     on conflict (api_match_id) do update set
       league_key = coalesce(excluded.league_key, fact_match.league_key),
       season = coalesce(excluded.season, fact_match.season),
       date_key = coalesce(excluded.date_key, fact_match.date_key),
       venue_key = coalesce(excluded.venue_key, fact_match.venue_key),
       referee_key = coalesce(excluded.referee_key, fact_match.referee_key),
       home_team_key = coalesce(excluded.home_team_key, fact_match.home_team_key),
       away_team_key = coalesce(excluded.away_team_key, fact_match.away_team_key),
       home_goals = excluded.home_goals,
       away_goals = excluded.away_goals,
       attendance = coalesce(excluded.attendance, fact_match.attendance),
       possession_home = coalesce(excluded.possession_home, fact_match.possession_home),
       possession_away = coalesce(excluded.possession_away, fact_match.possession_away),
       status = coalesce(excluded.status, fact_match.status)
     returning match_key as "matchKey"`,
    [
      row.apiMatchId,
      row.leagueKey,
      row.season,
      row.dateKey,
      row.venueKey,
      row.refereeKey,
      row.homeTeamKey,
      row.awayTeamKey,
      row.homeGoals,
      row.awayGoals,
      row.attendance,
      row.possessionHome,
      row.possessionAway,
      row.status,
    ],
    client,
  );
  return result.rows[0].matchKey;
}
