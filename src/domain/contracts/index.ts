// 中文注释：领域层抽象接口（高内聚、低耦合，不依赖基础设施）

export const ANALYSIS_TYPES = [
  'Component Verification',
  'Pin Configuration Check',
  'Power Supply Analysis',
  'Design Compliance',
  'Missing Components',
  'Custom Query'
] as const

export type AnalysisType = typeof ANALYSIS_TYPES[number]
export const CUSTOM_QUERY: AnalysisType = 'Custom Query'

export type Severity = 'CRITICAL' | 'HIGH' | 'MEDIUM' | 'LOW' | 'INFO'

export type IssueCategory = 'connectivity' | 'power' | 'components' | 'specifications' | 'general'

export type DatasheetRecord = {
  componentName?: string
  pinConfig?: Record<string, string>
  electricalSpecs?: Record<string, string>
  features?: string[]
  recommendedCircuits?: string[]
  operatingConditions?: Record<string, string>
  packageInfo?: string
}

export type SchematicRef = { path: string; filename?: string }

export type AnalysisRequest = {
  image: SchematicRef
  analysisType: string
  customQuery?: string
  // 数据表解析结果；任意值均可传入，由 ContextBuilder 边界统一规范化
  datasheet?: unknown
  progressId?: string
  signal?: AbortSignal
}

// 图像来源契约：核心只关心编码结果与是否就绪
export type PreparedImage = {
  encodedImage: string
  ready: boolean
  error?: string
  width?: number
  height?: number
  format?: string
}

export type DatasheetContext = {
  componentName: string
  summary: string
  pinConfiguration?: string
  keySpecifications?: string
  designGuidelines?: string
}

export type AnalysisContext = Readonly<{
  analysisType: AnalysisType
  prompt: string
  image: PreparedImage
  hasDatasheet: boolean
  schematic: Readonly<{ path: string; filename: string }>
  datasheet?: Readonly<DatasheetContext>
  timestamp: string
}>

export type Finding = { description: string; severity: Severity; type: 'issue' | 'verification' }
export type Issue = { description: string; severity: Severity; component: string; category: IssueCategory }

export type ConfidenceLevel = 'High' | 'Medium' | 'Low'
export type QualityLevel = 'Excellent' | 'Good' | 'Fair' | 'Basic'

export type AnalysisStage = 'idle' | 'validating' | 'building_context' | 'invoking' | 'parsing' | 'done' | 'errored'

export type AnalysisMetadata = {
  schematicFile: string
  hasDatasheet: boolean
  datasheetComponent: string
  confidence: ConfidenceLevel | 'N/A'
  confidenceScore?: number
  analysisQuality: QualityLevel | 'Error'
  qualityScore?: number
  analysisTime?: number
  timestamp: string
  cached?: boolean
  error?: boolean
  errorMessage?: string
  failedStage?: AnalysisStage
}

export type AnalysisResult = {
  analysisType: string
  summary: string
  content: string
  findings: Finding[]
  recommendations: string[]
  issues: Issue[]
  rawResponse: string
  metadata: AnalysisMetadata
}

export type GenerationOptions = {
  temperature: number
  topP: number
  topK: number
  maxTokens: number
}

export type GatewayStatus = {
  reachable: boolean
  model: string
  modelAvailable: boolean
  availableModels: string[]
  error?: string
}

export interface ModelGateway {
  checkConnection(): Promise<boolean>
  generate(prompt: string, image: string, options: GenerationOptions, signal?: AbortSignal): Promise<string>
  status(): Promise<GatewayStatus>
}

export interface ImageSource {
  prepare(imagePath: string): Promise<PreparedImage>
}

export type TimelineItem = { step: string; ts: number; origin: 'agent' | 'backend'; category?: string; meta?: Record<string, unknown> }

export interface ProgressStore {
  init(id: string): Promise<void>
  push(id: string, item: TimelineItem): Promise<void>
  get(id: string): Promise<TimelineItem[]>
  clear(id: string): Promise<void>
}

export type SavedArtifact = { url: string; filename: string }

export interface ArtifactStore {
  save(content: string, hint: string, opts?: { ext?: string }): Promise<SavedArtifact>
}
