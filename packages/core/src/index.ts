//---------------------------------------------------------------------------
// @spanindex/core, an augmented interval tree for JS.
// Copyright (C) 2016-2021 Tony Garnock-Jones <tonyg@leastfixedpoint.com>
//
// This program is free software: you can redistribute it and/or modify
// it under the terms of the GNU General Public License as published by
// the Free Software Foundation, either version 3 of the License, or
// (at your option) any later version.
//
// This program is distributed in the hope that it will be useful,
// but WITHOUT ANY WARRANTY; without even the implied warranty of
// MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE.  See the
// GNU General Public License for more details.
//
// You should have received a copy of the GNU General Public License
// along with this program.  If not, see <https://www.gnu.org/licenses/>.
//---------------------------------------------------------------------------

export * from './runtime/bound.js';
export * from './runtime/errors.js';
export * from './runtime/node.js';
export * from './runtime/rotation.js';
export * from './runtime/invariants.js';
export * from './runtime/render.js';
export * from './runtime/tree.js';
export * as Walk from './runtime/walk.js';
