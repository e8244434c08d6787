// Canonical project model. Field names follow the serialized (camelCase) form
// of the shared LCA exchange format; enumeration values are its variant names.

export const FORMAT_VERSION = '2.0.0';

export const BUILDING_TYPES = [
  'new_construction_works',
  'demolition',
  'deconstruction_and_new_construction_works',
  'retrofit_works',
  'extension_works',
  'retrofit_and_extension_works',
  'fit_out_works',
  'operations',
  'unknown',
  'other'
] as const;
export type BuildingType = (typeof BUILDING_TYPES)[number];

export const BUILDING_TYPOLOGIES = [
  'office',
  'residential',
  'public',
  'commercial',
  'industrial',
  'infrastructure',
  'agricultural',
  'educational',
  'health',
  'unknown',
  'other'
] as const;
export type BuildingTypology = (typeof BUILDING_TYPOLOGIES)[number];

export const ROOF_TYPES = ['flat', 'pitched', 'saddle', 'pyramid', 'unknown', 'other'] as const;
export type RoofType = (typeof ROOF_TYPES)[number];

export const GENERAL_ENERGY_CLASSES = ['existing', 'standard', 'advanced', 'unknown'] as const;
export type GeneralEnergyClass = (typeof GENERAL_ENERGY_CLASSES)[number];

export const LIFE_CYCLE_STAGES = [
  'a0',
  'a1a3',
  'a4',
  'a5',
  'b1',
  'b2',
  'b3',
  'b4',
  'b5',
  'b6',
  'b7',
  'b8',
  'c1',
  'c2',
  'c3',
  'c4',
  'd'
] as const;
export type LifeCycleStage = (typeof LIFE_CYCLE_STAGES)[number];

export const IMPACT_CATEGORY_KEYS = [
  'gwp',
  'gwp_fos',
  'gwp_bio',
  'gwp_lul',
  'odp',
  'ap',
  'ep',
  'ep_fw',
  'ep_mar',
  'ep_ter',
  'pocp',
  'adpe',
  'adpf',
  'penre',
  'pere',
  'perm',
  'pert',
  'penrt',
  'penrm',
  'sm',
  'pm',
  'wdp',
  'irp',
  'etp_fw',
  'htp_c',
  'htp_nc',
  'sqp',
  'rsf',
  'nrsf',
  'fw',
  'hwd',
  'nhwd',
  'rwd',
  'cru',
  'mrf',
  'mer',
  'eee',
  'eet'
] as const;
export type ImpactCategoryKey = (typeof IMPACT_CATEGORY_KEYS)[number];

export const UNITS = ['m', 'm2', 'm3', 'kg', 'tones', 'pcs', 'kwh', 'l', 'm2r1', 'km', 'tones_km', 'kgm3', 'unknown'] as const;
export type Unit = (typeof UNITS)[number];

export const PROJECT_PHASES = [
  'strategic_design',
  'concept_design',
  'technical_design',
  'construction',
  'post_completion',
  'in_use',
  'other'
] as const;
export type ProjectPhase = (typeof PROJECT_PHASES)[number];

/** Lowercase ISO 3166 alpha-3 code, or `unknown`. */
export type Country = string;

export type StageResults = Partial<Record<LifeCycleStage, number>>;
export type ImpactResults = Partial<Record<ImpactCategoryKey, StageResults>>;

export type MetaData = Record<string, unknown>;

export interface Location {
  country: Country;
  city: string | null;
  address: string | null;
}

export interface ValueUnit {
  value: number;
  unit: Unit;
}

export interface AreaType {
  value: number;
  unit: Unit;
  definition: string;
}

export interface Classification {
  system: string;
  code: string;
  name: string;
}

export interface SoftwareInfo {
  lcaSoftware: string;
  lcaSoftwareVersion: string | null;
  goalAndScopeDefinition: string | null;
  calculationType: string | null;
}

export interface BuildingInfo {
  type: 'buildingInfo';
  buildingType: BuildingType;
  buildingTypology: BuildingTypology[];
  grossFloorArea: AreaType | null;
  buildingFootprint: ValueUnit | null;
  buildingHeight: ValueUnit | null;
  buildingCompletionYear: number | null;
  buildingUsers: number | null;
  floorsAboveGround: number;
  floorsBelowGround: number | null;
  frameType: string | null;
  generalEnergyClass: GeneralEnergyClass;
  roofType: RoofType;
}

export interface TechFlow {
  id: string;
  name: string;
  declaredUnit: Unit;
  formatVersion: string;
  source: string | null;
  comment: string | null;
  location: Country;
  conversions: null;
  impacts: ImpactResults;
  metaData: MetaData | null;
}

export interface ProductEntity {
  id: string;
  name: string;
  description: string;
  referenceServiceLife: number | null;
  quantity: number;
  unit: Unit;
  results: ImpactResults | null;
  impactData: TechFlow;
  metaData: MetaData | null;
}

export interface AssemblyEntity {
  id: string;
  name: string;
  description: string;
  comment: string | null;
  classification: Classification[] | null;
  quantity: number;
  unit: Unit;
  results: ImpactResults | null;
  metaData: MetaData | null;
  products: Map<string, ProductEntity>;
}

export interface ProjectEntity {
  id: string;
  name: string;
  description: string;
  comment: string | null;
  location: Location;
  owner: string | null;
  formatVersion: string;
  classificationSystem: string | null;
  referenceStudyPeriod: number | null;
  lifeCycleStages: LifeCycleStage[];
  impactCategories: ImpactCategoryKey[];
  results: ImpactResults | null;
  projectInfo: BuildingInfo;
  projectPhase: ProjectPhase;
  softwareInfo: SoftwareInfo;
  metaData: MetaData;
  assemblies: Map<string, AssemblyEntity>;
}

// Serializable forms produced by the output assembler.

export interface ProductRecord extends Omit<ProductEntity, 'impactData'> {
  type: 'actual';
  impactData: TechFlow & { type: 'actual' };
  transport: null;
}

export interface AssemblyRecord extends Omit<AssemblyEntity, 'products'> {
  type: 'actual';
  products: Record<string, ProductRecord>;
}

export interface ProjectRecord extends Omit<ProjectEntity, 'assemblies'> {
  assemblies: Record<string, AssemblyRecord>;
}
