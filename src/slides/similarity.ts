import { createFrameMismatchError } from '../errors.js'
import type { Frame, FrameComparator, FrameDissimilarity, RgbImage } from './types.js'

export type SimilarityOptions = {
  /** Luminance planes wider than this are block-averaged down before SSIM. */
  comparisonWidth?: number | null
  histogramBins?: number
}

export type LuminancePlane = {
  data: Float64Array
  width: number
  height: number
}

type FrameFeatures = {
  luma: LuminancePlane
  histogram: Float64Array
}

const DEFAULT_SSIM_WINDOW = 7
const DEFAULT_HISTOGRAM_BINS = 16
const SSIM_C1 = (0.01 * 255) ** 2
const SSIM_C2 = (0.03 * 255) ** 2

const clampUnit = (value: number) => (value < 0 ? 0 : value > 1 ? 1 : value)

function assertImage(image: RgbImage): void {
  if (!Number.isInteger(image.width) || !Number.isInteger(image.height)) {
    throw createFrameMismatchError(`Invalid frame size ${image.width}x${image.height}`)
  }
  if (image.width <= 0 || image.height <= 0) {
    throw createFrameMismatchError(`Invalid frame size ${image.width}x${image.height}`)
  }
  const expected = image.width * image.height * 3
  if (image.data.length < expected) {
    throw createFrameMismatchError(
      `Frame buffer too small: ${image.data.length} bytes for ${image.width}x${image.height} RGB`
    )
  }
}

export function toLuminance(image: RgbImage): LuminancePlane {
  assertImage(image)
  const pixels = image.width * image.height
  const data = new Float64Array(pixels)
  const src = image.data
  for (let i = 0, p = 0; i < pixels; i += 1, p += 3) {
    data[i] = 0.299 * src[p] + 0.587 * src[p + 1] + 0.114 * src[p + 2]
  }
  return { data, width: image.width, height: image.height }
}

export function downsampleLuminance(
  plane: LuminancePlane,
  targetWidth: number | null | undefined
): LuminancePlane {
  if (!targetWidth || targetWidth <= 0 || plane.width <= targetWidth) return plane
  const factor = Math.floor(plane.width / targetWidth)
  if (factor <= 1) return plane
  const width = Math.floor(plane.width / factor)
  const height = Math.max(1, Math.floor(plane.height / factor))
  const effectiveFactorY = Math.min(factor, plane.height)
  const data = new Float64Array(width * height)
  const area = factor * effectiveFactorY
  for (let y = 0; y < height; y += 1) {
    for (let x = 0; x < width; x += 1) {
      let sum = 0
      for (let dy = 0; dy < effectiveFactorY; dy += 1) {
        const row = (y * effectiveFactorY + dy) * plane.width
        for (let dx = 0; dx < factor; dx += 1) {
          sum += plane.data[row + x * factor + dx]
        }
      }
      data[y * width + x] = sum / area
    }
  }
  return { data, width, height }
}

function buildIntegral(
  width: number,
  height: number,
  valueAt: (index: number) => number
): Float64Array {
  const stride = width + 1
  const table = new Float64Array(stride * (height + 1))
  for (let y = 0; y < height; y += 1) {
    let rowSum = 0
    for (let x = 0; x < width; x += 1) {
      rowSum += valueAt(y * width + x)
      table[(y + 1) * stride + x + 1] = table[y * stride + x + 1] + rowSum
    }
  }
  return table
}

function resolveWindowSize(requested: number, width: number, height: number): number {
  let size = Math.max(1, Math.min(Math.floor(requested), width, height))
  if (size % 2 === 0) size -= 1
  return Math.max(1, size)
}

/**
 * Mean structural similarity over every fully-contained square window
 * (uniform weights, sample covariance). 1 means identical planes.
 */
export function computeSsim(
  a: LuminancePlane,
  b: LuminancePlane,
  windowSize = DEFAULT_SSIM_WINDOW
): number {
  if (a.width !== b.width || a.height !== b.height) {
    throw createFrameMismatchError(
      `Cannot compare ${a.width}x${a.height} with ${b.width}x${b.height}`
    )
  }
  const { width, height } = a
  const win = resolveWindowSize(windowSize, width, height)
  const n = win * win
  const covNorm = n > 1 ? n / (n - 1) : 1
  const stride = width + 1

  const sumA = buildIntegral(width, height, (i) => a.data[i])
  const sumB = buildIntegral(width, height, (i) => b.data[i])
  const sumAA = buildIntegral(width, height, (i) => a.data[i] * a.data[i])
  const sumBB = buildIntegral(width, height, (i) => b.data[i] * b.data[i])
  const sumAB = buildIntegral(width, height, (i) => a.data[i] * b.data[i])

  const windowSum = (table: Float64Array, x: number, y: number) =>
    table[(y + win) * stride + x + win] -
    table[y * stride + x + win] -
    table[(y + win) * stride + x] +
    table[y * stride + x]

  let total = 0
  let count = 0
  for (let y = 0; y + win <= height; y += 1) {
    for (let x = 0; x + win <= width; x += 1) {
      const ux = windowSum(sumA, x, y) / n
      const uy = windowSum(sumB, x, y) / n
      const vx = (windowSum(sumAA, x, y) / n - ux * ux) * covNorm
      const vy = (windowSum(sumBB, x, y) / n - uy * uy) * covNorm
      const vxy = (windowSum(sumAB, x, y) / n - ux * uy) * covNorm
      const numerator = (2 * ux * uy + SSIM_C1) * (2 * vxy + SSIM_C2)
      const denominator = (ux * ux + uy * uy + SSIM_C1) * (vx + vy + SSIM_C2)
      total += numerator / denominator
      count += 1
    }
  }
  return count === 0 ? 1 : total / count
}

/**
 * Joint RGB histogram with `bins` buckets per channel, min/max normalised to [0, 1].
 */
export function computeColorHistogram(
  image: RgbImage,
  bins = DEFAULT_HISTOGRAM_BINS
): Float64Array {
  assertImage(image)
  const perChannel = Math.max(1, Math.min(256, Math.floor(bins)))
  const counts = new Float64Array(perChannel * perChannel * perChannel)
  const pixels = image.width * image.height
  const src = image.data
  for (let i = 0, p = 0; i < pixels; i += 1, p += 3) {
    const r = (src[p] * perChannel) >> 8
    const g = (src[p + 1] * perChannel) >> 8
    const bl = (src[p + 2] * perChannel) >> 8
    counts[(r * perChannel + g) * perChannel + bl] += 1
  }
  return normalizeMinMax(counts)
}

export function normalizeMinMax(values: Float64Array): Float64Array {
  let min = Number.POSITIVE_INFINITY
  let max = Number.NEGATIVE_INFINITY
  for (const value of values) {
    if (value < min) min = value
    if (value > max) max = value
  }
  const out = new Float64Array(values.length)
  const range = max - min
  if (!(range > 0)) return out
  for (let i = 0; i < values.length; i += 1) {
    out[i] = (values[i] - min) / range
  }
  return out
}

/**
 * Pearson correlation in [-1, 1]. A zero-variance pair compares as fully correlated.
 */
export function correlateHistograms(a: Float64Array, b: Float64Array): number {
  if (a.length !== b.length) {
    throw createFrameMismatchError(`Histogram sizes differ: ${a.length} vs ${b.length}`)
  }
  const length = a.length
  if (length === 0) return 1
  let meanA = 0
  let meanB = 0
  for (let i = 0; i < length; i += 1) {
    meanA += a[i]
    meanB += b[i]
  }
  meanA /= length
  meanB /= length
  let numerator = 0
  let varA = 0
  let varB = 0
  for (let i = 0; i < length; i += 1) {
    const da = a[i] - meanA
    const db = b[i] - meanB
    numerator += da * db
    varA += da * da
    varB += db * db
  }
  const denominator = varA * varB
  if (Math.abs(denominator) <= Number.EPSILON) return 1
  return numerator / Math.sqrt(denominator)
}

export function createFrameComparator(options: SimilarityOptions = {}): FrameComparator {
  const bins = options.histogramBins ?? DEFAULT_HISTOGRAM_BINS
  const features = new WeakMap<Frame, FrameFeatures>()

  const resolveFeatures = (frame: Frame): FrameFeatures => {
    const cached = features.get(frame)
    if (cached) return cached
    const next = {
      luma: downsampleLuminance(toLuminance(frame.image), options.comparisonWidth),
      histogram: computeColorHistogram(frame.image, bins),
    }
    features.set(frame, next)
    return next
  }

  const compare = (previous: Frame, current: Frame): FrameDissimilarity => {
    if (
      previous.image.width !== current.image.width ||
      previous.image.height !== current.image.height
    ) {
      throw createFrameMismatchError(
        `Frame at ${current.timestamp}s is ${current.image.width}x${current.image.height}, expected ${previous.image.width}x${previous.image.height}`
      )
    }
    const a = resolveFeatures(previous)
    const b = resolveFeatures(current)
    return {
      structural: clampUnit(1 - computeSsim(a.luma, b.luma)),
      histogram: clampUnit(1 - correlateHistograms(a.histogram, b.histogram)),
    }
  }

  return { compare }
}
