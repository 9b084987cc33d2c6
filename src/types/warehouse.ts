// 역할: 스타 스키마 차원/팩트 테이블에 적재하는 행 타입 정의.

export type SoccerLeagueRow = {
  apiLeagueId: number;
  name: string | null;
  country: string | null;
  leagueType: string | null;
};

export type SoccerTeamRow = {
  apiTeamId: number;
  name: string | null;
  shortCode: string | null;
  country: string | null;
  founded: number | null;
  stadiumName: string | null;
  city: string | null;
};

export type VenueRow = {
  apiVenueId: number;
  name: string | null;
  city: string | null;
  capacity: number | null;
};

export type RefereeRow = {
  name: string;
  nationality: string | null;
};

export type MatchFactRow = {
  apiMatchId: number;
  leagueKey: number | null;
  season: number | null;
  dateKey: number | null;
  venueKey: number | null;
  refereeKey: number | null;
  homeTeamKey: number | null;
  awayTeamKey: number | null;
  homeGoals: number | null;
  awayGoals: number | null;
  attendance: number | null;
  possessionHome: number | null;
  possessionAway: number | null;
  status: string | null;
};

export type BasketballLeagueRow = {
  apiLeagueId: number;
  name: string | null;
  country: string | null;
  leagueType: string | null;
};

export type BasketballTeamRow = {
  apiTeamId: number;
  name: string | null;
  country: string | null;
};

export type BasketballPlayerRow = {
  apiPlayerId: number;
  fullName: string | null;
  position: string | null;
  nationality: string | null;
  jerseyNumber: string | null;
};

export type GameFactRow = {
  apiGameId: number;
  leagueKey: number | null;
  season: string | null;
  dateKey: number | null;
  homeTeamKey: number | null;
  awayTeamKey: number | null;
  homePoints: number | null;
  awayPoints: number | null;
  status: string | null;
};

export type CircuitRow = {
  apiCircuitId: number;
  name: string | null;
  location: string | null;
  country: string | null;
  lengthKm: number | null;
};

export type RaceRow = {
  apiRaceId: number;
  season: number | null;
  raceName: string | null;
  raceType: string | null;
  dateKey: number | null;
  circuitKey: number | null;
};

export type DriverRow = {
  apiDriverId: number;
  name: string | null;
  abbr: string | null;
  nationality: string | null;
  // yyyy-mm-dd
  birthdate: string | null;
  number: number | null;
};

export type F1TeamRow = {
  apiTeamId: number;
  name: string | null;
  base: string | null;
  director: string | null;
};

export type RaceResultFactRow = {
  raceKey: number;
  driverKey: number;
  teamKey: number | null;
  position: number | null;
  grid: number | null;
  laps: number | null;
  raceTime: string | null;
  gap: string | null;
  pits: number | null;
  points: number | null;
};
