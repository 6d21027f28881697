/**
 * Constructors for all non-deprecated SVG elements. All of them are foreign
 * elements, so tag and attribute names keep their casing (`viewBox`,
 * `linearGradient`).
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/SVG/Element
 */

import { elementFactory } from './element.js';

export const a = elementFactory('a', 'foreign');
export const animate = elementFactory('animate', 'foreign');
export const animateMotion = elementFactory('animateMotion', 'foreign');
export const animateTransform = elementFactory('animateTransform', 'foreign');
export const circle = elementFactory('circle', 'foreign');
export const clipPath = elementFactory('clipPath', 'foreign');
export const defs = elementFactory('defs', 'foreign');
export const desc = elementFactory('desc', 'foreign');
export const ellipse = elementFactory('ellipse', 'foreign');
export const feBlend = elementFactory('feBlend', 'foreign');
export const feColorMatrix = elementFactory('feColorMatrix', 'foreign');
export const feComponentTransfer = elementFactory('feComponentTransfer', 'foreign');
export const feComposite = elementFactory('feComposite', 'foreign');
export const feConvolveMatrix = elementFactory('feConvolveMatrix', 'foreign');
export const feDiffuseLighting = elementFactory('feDiffuseLighting', 'foreign');
export const feDisplacementMap = elementFactory('feDisplacementMap', 'foreign');
export const feDistantLight = elementFactory('feDistantLight', 'foreign');
export const feDropShadow = elementFactory('feDropShadow', 'foreign');
export const feFlood = elementFactory('feFlood', 'foreign');
export const feFuncA = elementFactory('feFuncA', 'foreign');
export const feFuncB = elementFactory('feFuncB', 'foreign');
export const feFuncG = elementFactory('feFuncG', 'foreign');
export const feFuncR = elementFactory('feFuncR', 'foreign');
export const feGaussianBlur = elementFactory('feGaussianBlur', 'foreign');
export const feImage = elementFactory('feImage', 'foreign');
export const feMerge = elementFactory('feMerge', 'foreign');
export const feMergeNode = elementFactory('feMergeNode', 'foreign');
export const feMorphology = elementFactory('feMorphology', 'foreign');
export const feOffset = elementFactory('feOffset', 'foreign');
export const fePointLight = elementFactory('fePointLight', 'foreign');
export const feSpecularLighting = elementFactory('feSpecularLighting', 'foreign');
export const feSpotLight = elementFactory('feSpotLight', 'foreign');
export const feTile = elementFactory('feTile', 'foreign');
export const feTurbulence = elementFactory('feTurbulence', 'foreign');
export const filter = elementFactory('filter', 'foreign');
export const foreignObject = elementFactory('foreignObject', 'foreign');
export const g = elementFactory('g', 'foreign');
export const image = elementFactory('image', 'foreign');
export const line = elementFactory('line', 'foreign');
export const linearGradient = elementFactory('linearGradient', 'foreign');
export const marker = elementFactory('marker', 'foreign');
export const mask = elementFactory('mask', 'foreign');
export const metadata = elementFactory('metadata', 'foreign');
export const mpath = elementFactory('mpath', 'foreign');
export const path = elementFactory('path', 'foreign');
export const pattern = elementFactory('pattern', 'foreign');
export const polygon = elementFactory('polygon', 'foreign');
export const polyline = elementFactory('polyline', 'foreign');
export const radialGradient = elementFactory('radialGradient', 'foreign');
export const rect = elementFactory('rect', 'foreign');
export const script = elementFactory('script', 'foreign');
export const set = elementFactory('set', 'foreign');
export const stop = elementFactory('stop', 'foreign');
export const style = elementFactory('style', 'foreign');
export const svg = elementFactory('svg', 'foreign');
export const switch_ = elementFactory('switch', 'foreign');
export const symbol = elementFactory('symbol', 'foreign');
export const text = elementFactory('text', 'foreign');
export const textPath = elementFactory('textPath', 'foreign');
export const title = elementFactory('title', 'foreign');
export const tspan = elementFactory('tspan', 'foreign');
export const use = elementFactory('use', 'foreign');
export const view = elementFactory('view', 'foreign');
