/**
 * Grid Layout Demo - Visual Demonstration
 *
 * Shows the complete grid placement workflow:
 * 1. Declare cells as text
 * 2. Compute the desired (minimum) geometry
 * 3. Lay the grid out in a larger box and print every cell
 */

import { BBox } from './src/geometry/bbox.js';
import { GridLayout } from './src/layout/grid-layout.js';

const grid = new GridLayout();

console.log('╔═══════════════════════════════════════════════════════════════╗');
console.log('║              Grid Placement - Layout Demo                     ║');
console.log('╚═══════════════════════════════════════════════════════════════╝\n');

// Step 1: Three columns under a header, two rows; growth is applied in the order given
console.log('📦 Step 1: Declaring grid\n');

const cellText: Array<['x' | 'y', string]> = [
  ['x', 'left 20 mid 40 right 20 end'],
  ['x', 'left +1 end'],
  ['x', 'mid +2 right'],
  ['y', 'top 10 body 30+1 bottom'],
];
for (const [axis, text] of cellText) {
  grid.addCellDataText(axis, text);
  console.log(`   ${axis}: ${text}`);
}
grid.addGridElement(['left', 'top'], ['end', 'body'], [90, 12]);
grid.setGridExpand('x', 1);
grid.setGridExpand('y', 0.5);
console.log('   header spans left..end, at least 90 x 12\n');

// Step 2: Desired geometry
console.log('📐 Step 2: Desired geometry\n');
const desired = grid.getDesiredGeometry();
const [, , dw, dh] = desired.getCwh();
console.log(`   ${desired.toString()}  (${dw} x ${dh})\n`);

// Step 3: Layout
console.log('🧮 Step 3: Layout within 200 x 100\n');
grid.layout(BBox.fromCorners(0, 0, 200, 100));

const positions = grid.getGridPositions();
for (const axis of ['x', 'y'] as const) {
  const line = [...positions[axis]].map(([name, p]) => `${name}=${p.toFixed(2)}`).join('  ');
  console.log(`   ${axis}: ${line}`);
}

console.log('\n   Cells:');
const cells: Array<[string, [string, string], [string, string]]> = [
  ['header', ['left', 'top'], ['end', 'body']],
  ['nav', ['left', 'body'], ['mid', 'bottom']],
  ['main', ['mid', 'body'], ['right', 'bottom']],
  ['aside', ['right', 'body'], ['end', 'bottom']],
];
for (const [name, start, end] of cells) {
  console.log(`   ${name.padEnd(8)} ${grid.gridBBox(start, end).toString()}`);
}

for (const axis of ['x', 'y'] as const) {
  for (const warning of grid.getPlacement(axis).getWarnings()) {
    console.log(`   ⚠️  ${axis}: ${warning}`);
  }
}
console.log('\n✅ Done');
