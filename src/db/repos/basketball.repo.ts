// 역할: 농구 차원(리그/팀/선수)과 fact_game_basketball 업서트 레포지토리.

import { query, type DbClient } from "../client";
import type {
  BasketballLeagueRow,
  BasketballPlayerRow,
  BasketballTeamRow,
  GameFactRow,
} from "../../types/warehouse";

export async function upsertBasketballLeague(
  row: BasketballLeagueRow,
  client?: DbClient,
): Promise<number> {
  const result = await query<{ leagueKey: number }>(
    `insert into public.dim_league_basketball (api_league_id, name, country, league_type)
     values ($1, $2, $3, $4)
     on conflict (api_league_id) do update set
       name = coalesce(excluded.name, dim_league_basketball.name),
       country = coalesce(excluded.country, dim_league_basketball.country),
       league_type = coalesce(excluded.league_type, dim_league_basketball.league_type)
     returning league_key as "leagueKey"`,
    [row.apiLeagueId, row.name, row.country, row.leagueType],
    client,
  );
  return result.rows[0].leagueKey;
}

export async function upsertBasketballTeam(
  row: BasketballTeamRow,
  client?: DbClient,
): Promise<number> {
  const result = await query<{ teamKey: number }>(
    `insert into public.dim_team_basketball (api_team_id, name, country)
     values ($1, $2, $3)
     on conflict (api_team_id) do update set
       name = coalesce(excluded.name, dim_team_basketball.name),
       country = coalesce(excluded.country, dim_team_basketball.country)
     returning team_key as "teamKey"`,
    [row.apiTeamId, row.name, row.country],
    client,
  );
  return result.rows[0].teamKey;
}

export async function upsertBasketballPlayer(
  row: BasketballPlayerRow,
  client?: DbClient,
): Promise<number> {
  const result = await query<{ playerKey: number }>(
    `insert into public.dim_player_basketball
      (api_player_id, full_name, position, nationality, jersey_number)
     values ($1, $2, $3, $4, $5)
     on conflict (api_player_id) do update set
       full_name = coalesce(excluded.full_name, dim_player_basketball.full_name),
       position = coalesce(excluded.position, dim_player_basketball.position),
       nationality = coalesce(excluded.nationality, dim_player_basketball.nationality),
       jersey_number = coalesce(excluded.jersey_number, dim_player_basketball.jersey_number)
     returning player_key as "playerKey"`,
    [row.apiPlayerId, row.fullName, row.position, row.nationality, row.jerseyNumber],
    client,
  );
  return result.rows[0].playerKey;
}

// 역할: api_game_id 기준으로 경기 팩트를 업서트한다. 점수는 최신 값으로 갱신.
export async function upsertGame(
  row: GameFactRow,
  client?: DbClient,
): Promise<number> {
  const result = await query<{ gameKey: number }>(
    `insert into public.fact_game_basketball
      (api_game_id, league_key, season, date_key, home_team_key, away_team_key,
       home_points, away_points, status)
     values ($1, $2, $3, $4, $5, $6, $7, $8, $9)
     on conflict (api_game_id) do update set
       league_key = coalesce(excluded.league_key, fact_game_basketball.league_key),
       season = coalesce(excluded.season, fact_game_basketball.season),
       date_key = coalesce(excluded.date_key, fact_game_basketball.date_key),
       home_team_key = coalesce(excluded.home_team_key, fact_game_basketball.home_team_key),
       away_team_key = coalesce(excluded.away_team_key, fact_game_basketball.away_team_key),
       home_points = excluded.home_points,
       away_points = excluded.away_points,
       status = coalesce(excluded.status, fact_game_basketball.status)
     returning game_key as "gameKey"`,
    [
      row.apiGameId,
      row.leagueKey,
      row.season,
      row.dateKey,
      row.homeTeamKey,
      row.awayTeamKey,
      row.homePoints,
      row.awayPoints,
      row.status,
    ],
    client,
  );
  return result.rows[0].gameKey;
}
