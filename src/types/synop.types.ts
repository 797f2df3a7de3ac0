/**
 * SYNOP report type definitions
 *
 * A decoded field is either `null` (the group was present but the field was
 * unavailable or invalid) or a record carrying its value, an optional unit
 * and, when a code table produced it, `_table` and `_code`. Keys that are
 * absent from a report were not present in the telegram.
 */

export type StationType = 'AAXX' | 'BBXX' | 'OOXX';
export type WmoRegion = 'I' | 'II' | 'III' | 'IV' | 'V' | 'VI' | 'Antarctic';
export type Compass = 'NE' | 'E' | 'SE' | 'S' | 'SW' | 'W' | 'NW' | 'N';
export type Quantifier = 'isLess' | 'isLessOrEqual' | 'isGreater' | 'isGreaterOrEqual';
export type CloudGenus = 'Ci' | 'Cc' | 'Cs' | 'Ac' | 'As' | 'Ns' | 'Sc' | 'St' | 'Cu' | 'Cb';
export type WindUnit = 'm/s' | 'KT';

export interface Provenance {
  _table?: string;
  _code?: number;
}

/** A plain physical or counted value */
export interface Measure<T = number> {
  value: T;
  unit?: string;
}

/** A code table payload plus the provenance that produced it */
export type Coded<P> = P & Provenance;

// --- Code table payloads ---

export interface CodeValue {
  value: number;
}

export interface TextValue {
  value: string;
}

export interface RegionValue {
  value: WmoRegion;
}

export interface SurfaceValue {
  value: number;
  unit: 'hPa';
}

export interface GenusValue {
  value: CloudGenus;
}

export interface DirectionValue {
  value: Compass | null;
  isCalmOrStationary: boolean;
  allDirections: boolean;
}

export interface IceBearingValue {
  value: Compass | null;
  in_shore: boolean;
  in_ice: boolean;
}

export interface WindDirectionValue {
  value: number | null;
  calm: boolean;
  varAllUnknown: boolean;
  unit: 'deg';
}

/** A bucket `[min, max)`; both ends are null when the code means "unknown" */
export interface RangeValue {
  min: number | null;
  max: number | null;
  quantifier: Quantifier | null;
  unit?: string;
}

export interface CloudElevationValue {
  value: number | null;
  quantifier: Quantifier | null;
  visible: boolean;
  unit: 'deg';
}

export interface CloudHeightValue {
  value: number | null;
  min?: number;
  max?: number | null;
  quantifier: Quantifier | null;
  /** Set on decoded values: whether the code came from the 90-99 band */
  use90?: boolean;
  unit: 'm';
}

export interface VisibilityValue {
  value: number;
  quantifier: Quantifier | null;
  use90?: boolean;
  unit: 'm';
}

export interface CloudCoverValue {
  value: number | null;
  obscured: boolean;
  unit: 'okta';
}

export interface IceSourceValue {
  spray: boolean;
  fog: boolean;
  rain: boolean;
}

export interface EvaporationTypeValue {
  value: 'evaporation' | 'evapotranspiration';
}

export interface PrecipitationAmountValue {
  value: number;
  quantifier: Quantifier | null;
  trace: boolean;
  unit: 'mm';
}

export interface DepositDiameterValue {
  value: number | null;
  quantifier: Quantifier | null;
  non_measurable: boolean;
  impossible: boolean;
  unit: 'mm';
}

export interface SnowFallValue {
  value: number | null;
  quantifier: Quantifier | null;
  inaccurate: boolean;
  unit: 'mm';
}

export interface SnowDepthValue {
  value: number | null;
  quantifier: Quantifier | null;
  continuous: boolean;
  impossible: boolean;
  unit: 'cm';
}

export interface WetBulbValue {
  sign: 1 | -1 | null;
  measured: boolean;
  iced: boolean;
}

export interface HoursValue {
  value: number;
  unit: 'h';
}

/**
 * A time span before the observation: an exact value, a range of hours, or
 * unknown.
 */
export interface PeriodValue {
  value?: number;
  min?: number;
  max?: number | null;
  quantifier?: Quantifier | null;
  unknown?: boolean;
  unit: string;
}

export interface SpeedBucket {
  min: number;
  max: number | null;
  quantifier: Quantifier | null;
  unit: 'KT' | 'km/h';
}

export interface ShipSpeedValue {
  value: [SpeedBucket, SpeedBucket];
}

// --- Section 0 ---

export interface ObservationTime {
  day: Measure;
  hour: Measure;
}

export interface WindIndicator {
  value: number;
  unit: WindUnit;
  estimated: boolean;
}

export interface RegionField extends Provenance {
  value: WmoRegion | 'SHIP';
}

export interface StationPosition {
  latitude: Measure | null;
  longitude: Measure | null;
  quadrant: Coded<CodeValue> | null;
  marsden_square?: Measure | null;
  elevation?: Measure | null;
  confidence?: Coded<TextValue> | null;
}

// --- Section 1 ---

export interface PrecipitationIndicator {
  value: number;
  in_group_1: boolean;
  in_group_3: boolean;
}

export interface WeatherIndicator {
  value: number;
  automatic: boolean;
}

export interface SurfaceWind {
  direction: Coded<WindDirectionValue> | null;
  speed: Measure | null;
}

export interface Geopotential {
  surface: Coded<SurfaceValue> | null;
  height: Measure | null;
}

export interface PressureTendency {
  tendency: Coded<CodeValue> | null;
  change: Measure | null;
}

export interface Precipitation {
  amount: Coded<PrecipitationAmountValue> | null;
  time_before_obs: Coded<HoursValue> | null;
}

export interface PresentWeather extends Provenance {
  value: number;
  time_before_obs?: PeriodValue;
}

export interface CloudTypes {
  low_cloud_type: Coded<CodeValue> | null;
  middle_cloud_type: Coded<CodeValue> | null;
  high_cloud_type: Coded<CodeValue> | null;
  low_cloud_amount?: Measure | null;
  middle_cloud_amount?: Measure | null;
  cloud_amount?: Measure | null;
}

export interface ExactObservationTime {
  hour: Measure | null;
  minute: Measure | null;
}

// --- Section 2 ---

export interface Displacement {
  direction: Coded<DirectionValue> | null;
  speed: Coded<ShipSpeedValue> | null;
}

export interface SeaSurfaceTemperature {
  value: number;
  unit: string;
  measurement_type: Coded<TextValue>;
}

export interface WindWave {
  period: Measure | null;
  height: Measure | null;
  instrumental: boolean;
  accurate: boolean;
  confused: boolean;
}

export interface SwellWave {
  /** First swell system (4PPHH) or second (5PPHH) */
  system: 1 | 2;
  direction?: Coded<WindDirectionValue> | null;
  /** Absent when only the 3dddd direction was sent */
  period?: Measure | null;
  height?: Measure | null;
}

export interface IceAccretion {
  source: Coded<IceSourceValue> | null;
  thickness: Measure | null;
  rate: Coded<TextValue> | null;
}

export type WetBulbTemperature = Coded<WetBulbValue> & {
  value: number | null;
  unit: string;
};

export interface SeaIceCondition {
  concentration: Coded<CodeValue> | null;
  development: Coded<CodeValue> | null;
  land_origin: Coded<CodeValue> | null;
  direction: Coded<IceBearingValue> | null;
  condition_trend: Coded<CodeValue> | null;
}

export interface SeaIceText {
  text: string;
}

export type SeaLandIce = SeaIceCondition | SeaIceText;

// --- Section 3 ---

export interface LocalPrecipitation {
  character: Coded<TextValue> | null;
  time: Coded<RangeValue> | null;
}

export interface GroundState {
  state: Coded<CodeValue> | null;
  temperature: Measure | null;
}

export interface GroundStateSnow {
  state: Coded<CodeValue> | null;
  depth: Coded<SnowDepthValue> | null;
}

export interface Evapotranspiration {
  amount: Measure | null;
  type: Coded<EvaporationTypeValue> | null;
}

export interface TemperatureChange {
  time_before_obs: Measure | null;
  change: Measure | null;
}

export interface Sunshine {
  amount: Measure | null;
  duration: Measure;
}

export type RadiationKind =
  | 'positive_net'
  | 'negative_net'
  | 'global_solar'
  | 'diffused_solar'
  | 'downward_long_wave'
  | 'upward_long_wave';

export interface Radiation {
  kind: RadiationKind;
  amount: Measure | null;
  time_before_obs: Measure;
}

export interface CloudDrift {
  low: Coded<DirectionValue> | null;
  middle: Coded<DirectionValue> | null;
  high: Coded<DirectionValue> | null;
}

export interface CloudElevation {
  genus: Coded<GenusValue> | null;
  direction: Coded<DirectionValue> | null;
  elevation: Coded<CloudElevationValue> | null;
}

export interface CloudLayer {
  cloud_cover: Coded<CloudCoverValue> | null;
  genus: Coded<GenusValue> | null;
  cloud_height: Coded<CloudHeightValue> | null;
}

export interface PrecipitationTime {
  time: Coded<RangeValue> | null;
  duration: Coded<RangeValue> | null;
}

/**
 * A `907tt` group as sent. `followed_by` holds the first three figures of
 * the 9-group after it, or null when it ended Section 3.
 */
export interface TimePeriod {
  period: PeriodValue | null;
  followed_by: string | null;
}

export interface HighestGust {
  speed: Measure | null;
  direction?: Coded<WindDirectionValue> | null;
  time_before_obs?: PeriodValue;
  measure_period?: Measure;
}

export interface SeaState {
  state: Coded<CodeValue> | null;
  visibility: Coded<RangeValue> | null;
}

export interface FrozenDeposit {
  deposit: Coded<CodeValue> | null;
  variation: Coded<CodeValue> | null;
}

export interface SnowCoverRegularity {
  cover: Coded<CodeValue> | null;
  regularity: Coded<CodeValue> | null;
}

export interface DriftSnow {
  phenomena: Coded<CodeValue> | null;
  evolution: Coded<CodeValue> | null;
}

export interface SnowFall {
  amount: Coded<SnowFallValue> | null;
  time_before_obs?: PeriodValue;
}

export type DepositType = 'solid' | 'glaze' | 'rime' | 'compound' | 'wet_snow';

export interface DepositDiameter {
  deposit_type: DepositType;
  diameter: Coded<DepositDiameterValue> | null;
}

export interface CloudEvolution {
  genus: Coded<GenusValue> | null;
  evolution: Coded<CodeValue> | null;
}

export interface DirectionalPhenomenon {
  phenomenon: Coded<CodeValue> | null;
  direction: Coded<DirectionValue> | null;
}

export interface MountainConditions {
  conditions: Coded<CodeValue> | null;
  evolution: Coded<CodeValue> | null;
}

export interface ValleyClouds {
  cover: Coded<CodeValue> | null;
  evolution: Coded<CodeValue> | null;
}

export interface VisibilityDirection {
  direction: Coded<{ value: Compass | 'towardsSea' }>;
  visibility: Coded<VisibilityValue> | null;
}

export interface OpticalPhenomena {
  phenomena: Coded<TextValue> | null;
  intensity: Coded<TextValue> | null;
}

export interface CondensationTrails {
  trail: Coded<CodeValue> | null;
  time: Coded<CodeValue> | null;
}

// --- Report ---

export interface SynopReport {
  // Section 0
  station_type?: { value: StationType };
  callsign?: { value: string };
  obs_time?: ObservationTime;
  wind_indicator?: WindIndicator | null;
  station_id?: { value: string };
  region?: RegionField;
  station_position?: StationPosition;

  // Section 1
  precipitation_indicator?: PrecipitationIndicator | null;
  weather_indicator?: WeatherIndicator | null;
  lowest_cloud_base?: Coded<RangeValue> | null;
  visibility?: Coded<VisibilityValue> | null;
  cloud_cover?: Coded<CloudCoverValue> | null;
  surface_wind?: SurfaceWind;
  air_temperature?: Measure | null;
  dewpoint_temperature?: Measure | null;
  relative_humidity?: Measure | null;
  station_pressure?: Measure | null;
  sea_level_pressure?: Measure | null;
  geopotential?: Geopotential;
  pressure_tendency?: PressureTendency;
  precipitation_s1?: Precipitation;
  present_weather?: PresentWeather | null;
  past_weather?: [Coded<CodeValue> | null, Coded<CodeValue> | null];
  cloud_types?: CloudTypes;
  exact_obs_time?: ExactObservationTime;

  // Section 2
  displacement?: Displacement | null;
  sea_surface_temperature?: SeaSurfaceTemperature | null;
  wind_waves?: WindWave[];
  swell_waves?: SwellWave[];
  ice_accretion?: IceAccretion;
  wet_bulb_temperature?: WetBulbTemperature | null;
  sea_land_ice?: SeaLandIce | null;

  // Section 3
  ground_minimum_temperature?: Measure | null;
  local_precipitation?: LocalPrecipitation;
  max_wind?: SurfaceWind;
  maximum_temperature?: Measure | null;
  minimum_temperature?: Measure | null;
  ground_state?: GroundState;
  ground_state_snow?: GroundStateSnow;
  evapotranspiration?: Evapotranspiration;
  temperature_change?: TemperatureChange;
  sunshine?: Sunshine | null;
  radiation?: Radiation[];
  cloud_drift_direction?: CloudDrift;
  cloud_elevation?: CloudElevation;
  pressure_change?: Measure | null;
  precipitation_s3?: Precipitation;
  cloud_layer?: CloudLayer[];
  variable_location_intensity?: Coded<CodeValue> | null;
  time_of_ending?: Coded<PeriodValue> | null;
  precipitation_time?: PrecipitationTime;
  time_periods?: TimePeriod[];
  highest_gust?: HighestGust[];
  sea_state?: SeaState;
  frozen_deposit?: FrozenDeposit;
  snow_cover_regularity?: SnowCoverRegularity;
  drift_snow?: DriftSnow;
  snow_fall?: SnowFall;
  deposit_diameter?: DepositDiameter;
  cloud_evolution?: CloudEvolution;
  max_low_cloud_concentration?: DirectionalPhenomenon;
  mountain_conditions?: MountainConditions;
  valley_clouds?: ValleyClouds;
  visibility_direction?: VisibilityDirection[];
  optical_phenomena?: OpticalPhenomena;
  mirage?: DirectionalPhenomenon;
  condensation_trails?: CondensationTrails;
  special_clouds?: DirectionalPhenomenon;
  day_darkness?: DirectionalPhenomenon;
  sudden_temperature_change?: Measure | null;
  sudden_humidity_change?: Measure | null;

  // Sections 4 and 5, kept verbatim
  section4?: string[];
  section5?: string[];

  /** Groups that are legal but not decoded, or could not be placed */
  _not_implemented?: string[];
}

export interface EncodeOptions {
  /** Encode visibilities through the 90-99 band when the report does not say */
  useVisibility90?: boolean;
  /** Encode cloud heights through the 90-99 band when the report does not say */
  useCloudHeight90?: boolean;
}
