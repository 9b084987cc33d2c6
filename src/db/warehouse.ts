// 역할: ETL 적재 단계가 의존하는 스타 스키마 쓰기 인터페이스와 pg 구현.

import type { CalendarDate } from "../types";
import type {
  BasketballLeagueRow,
  BasketballPlayerRow,
  BasketballTeamRow,
  CircuitRow,
  DriverRow,
  F1TeamRow,
  GameFactRow,
  MatchFactRow,
  RaceResultFactRow,
  RaceRow,
  RefereeRow,
  SoccerLeagueRow,
  SoccerTeamRow,
  VenueRow,
} from "../types/warehouse";
import { withTx, type DbClient } from "./client";
import { upsertDate } from "./repos/dates.repo";
import {
  upsertLeague,
  upsertMatch,
  upsertReferee,
  upsertTeam,
  upsertVenue,
} from "./repos/soccer.repo";
import {
  upsertBasketballLeague,
  upsertBasketballPlayer,
  upsertBasketballTeam,
  upsertGame,
} from "./repos/basketball.repo";
import {
  upsertCircuit,
  upsertDriver,
  upsertF1Team,
  upsertRace,
  upsertRaceResult,
} from "./repos/f1.repo";

// 모든 메서드는 자연키 기준 업서트이고 대리키를 돌려준다.
export interface StarSchemaWriter {
  upsertDate(date: CalendarDate): Promise<number>;

  upsertSoccerLeague(row: SoccerLeagueRow): Promise<number>;
  upsertSoccerTeam(row: SoccerTeamRow): Promise<number>;
  upsertVenue(row: VenueRow): Promise<number>;
  upsertReferee(row: RefereeRow): Promise<number>;
  upsertMatch(row: MatchFactRow): Promise<number>;

  upsertBasketballLeague(row: BasketballLeagueRow): Promise<number>;
  upsertBasketballTeam(row: BasketballTeamRow): Promise<number>;
  upsertBasketballPlayer(row: BasketballPlayerRow): Promise<number>;
  upsertGame(row: GameFactRow): Promise<number>;

  upsertCircuit(row: CircuitRow): Promise<number>;
  upsertRace(row: RaceRow): Promise<number>;
  upsertDriver(row: DriverRow): Promise<number>;
  upsertF1Team(row: F1TeamRow): Promise<number>;
  upsertRaceResult(row: RaceResultFactRow): Promise<number>;
}

// 문서 하나 단위의 트랜잭션 경계. 콜백이 throw하면 롤백된다.
export type Transactor = <T>(fn: (writer: StarSchemaWriter) => Promise<T>) => Promise<T>;

export function createPgWriter(client: DbClient): StarSchemaWriter {
  return {
    upsertDate: (date) => upsertDate(date, client),
    upsertSoccerLeague: (row) => upsertLeague(row, client),
    upsertSoccerTeam: (row) => upsertTeam(row, client),
    upsertVenue: (row) => upsertVenue(row, client),
    upsertReferee: (row) => upsertReferee(row, client),
    upsertMatch: (row) => upsertMatch(row, client),
    upsertBasketballLeague: (row) => upsertBasketballLeague(row, client),
    upsertBasketballTeam: (row) => upsertBasketballTeam(row, client),
    upsertBasketballPlayer: (row) => upsertBasketballPlayer(row, client),
    upsertGame: (row) => upsertGame(row, client),
    upsertCircuit: (row) => upsertCircuit(row, client),
    upsertRace: (row) => upsertRace(row, client),
    upsertDriver: (row) => upsertDriver(row, client),
    upsertF1Team: (row) => upsertF1Team(row, client),
    upsertRaceResult: (row) => upsertRaceResult(row, client),
  };
}

export const pgTransactor: Transactor = (fn) =>
  withTx((client) => fn(createPgWriter(client)));
