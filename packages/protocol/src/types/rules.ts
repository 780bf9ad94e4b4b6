// Game rules - tunable parameters of a session

/**
 * Settings for the one-off power-transfer event in which the weakest AI
 * player cedes everything to the strongest one.
 */
export type SuccessionRules = {
  enabled: boolean;

  /**
   * Earliest turn at which the event may fire
   */
  minimumTurn: number;

  /**
   * Some live non-REF player must score at least this much
   */
  strongThreshold: number;

  /**
   * The ceding player must score at most this much
   */
  weakThreshold: number;
};

export type VictoryRules = {
  /**
   * Win when a single non-REF player is left alive
   */
  lastPlayerStanding: boolean;

  /**
   * Win when a single human player is left alive
   */
  lastHumanStanding: boolean;
};

export type GameRules = {
  lineOfSight: {
    unit: number;
    settlement: number;
  };

  /**
   * Price per unit of goods in Europe, by goods type
   */
  market: Record<string, number>;

  /**
   * Gold each unit costs its owner at the start of a turn
   */
  unitUpkeep: number;

  startingGold: number;

  succession: SuccessionRules;

  victory: VictoryRules;

  /**
   * Upper bound on one AI planning call
   */
  aiTimeoutMs: number;

  /**
   * Forced end of turn after this long; null disables the timer
   */
  turnTimeoutMs: number | null;

  /**
   * Run the integrity checker every N operations; 0 disables periodic checks
   */
  integrityCheckInterval: number;
};
