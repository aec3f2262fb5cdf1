/**
 * Moves whole artifacts between native and canonical form.
 *
 * Every address-bearing field goes through the address lifter exactly once
 * per direction, and type names go through the optional alias table.
 * Inputs are never mutated.
 */

import type { AddressLifter } from "./address.js";
import {
  UNSET_ADDRESS,
  type Address,
  type Comment,
  type Enum,
  type FunctionArtifact,
  type FunctionHeader,
  type GlobalVariable,
  type Patch,
  type StackVariable,
  type Struct,
} from "./artifacts.js";
import { ConfigurationError } from "./errors.js";

type Direction = "lift" | "lower";

/**
 * Map of native type names to canonical ones, e.g. `{ "__int64": "long long" }`.
 */
export type TypeAliases = { [nativeType: string]: string };

export class ArtifactLifter {
  readonly addresses: AddressLifter;
  private readonly toCanonicalType: Map<string, string>;
  private readonly toNativeType: Map<string, string>;

  constructor(addresses: AddressLifter, typeAliases: TypeAliases = {}) {
    this.addresses = addresses;
    this.toCanonicalType = new Map(Object.entries(typeAliases));
    this.toNativeType = new Map();

    for (const [nativeType, canonicalType] of this.toCanonicalType) {
      const existing = this.toNativeType.get(canonicalType);
      if (existing !== undefined) {
        throw new ConfigurationError(
          `Type alias '${canonicalType}' is claimed by both '${existing}' and '${nativeType}'`
        );
      }
      this.toNativeType.set(canonicalType, nativeType);
    }
  }

  liftAddress(nativeAddr: Address): Address {
    return this.address(nativeAddr, "lift");
  }

  lowerAddress(canonicalAddr: Address): Address {
    return this.address(canonicalAddr, "lower");
  }

  liftType(nativeType: string): string {
    return this.toCanonicalType.get(nativeType) ?? nativeType;
  }

  lowerType(canonicalType: string): string {
    return this.toNativeType.get(canonicalType) ?? canonicalType;
  }

  liftFunction(fn: FunctionArtifact): FunctionArtifact {
    return this.func(fn, "lift");
  }

  lowerFunction(fn: FunctionArtifact): FunctionArtifact {
    return this.func(fn, "lower");
  }

  liftFunctionHeader(header: FunctionHeader): FunctionHeader {
    return this.header(header, "lift");
  }

  lowerFunctionHeader(header: FunctionHeader): FunctionHeader {
    return this.header(header, "lower");
  }

  liftStackVariable(svar: StackVariable): StackVariable {
    return this.stackVariable(svar, "lift");
  }

  lowerStackVariable(svar: StackVariable): StackVariable {
    return this.stackVariable(svar, "lower");
  }

  liftGlobalVariable(gvar: GlobalVariable): GlobalVariable {
    return this.globalVariable(gvar, "lift");
  }

  lowerGlobalVariable(gvar: GlobalVariable): GlobalVariable {
    return this.globalVariable(gvar, "lower");
  }

  liftStruct(struct: Struct): Struct {
    return this.struct(struct, "lift");
  }

  lowerStruct(struct: Struct): Struct {
    return this.struct(struct, "lower");
  }

  liftEnum(enumeration: Enum): Enum {
    return { name: enumeration.name, members: { ...enumeration.members } };
  }

  lowerEnum(enumeration: Enum): Enum {
    return { name: enumeration.name, members: { ...enumeration.members } };
  }

  liftComment(comment: Comment): Comment {
    return this.comment(comment, "lift");
  }

  lowerComment(comment: Comment): Comment {
    return this.comment(comment, "lower");
  }

  liftPatch(patch: Patch): Patch {
    return { addr: this.address(patch.addr, "lift"), bytes: patch.bytes.slice() };
  }

  lowerPatch(patch: Patch): Patch {
    return { addr: this.address(patch.addr, "lower"), bytes: patch.bytes.slice() };
  }

  // Address 0 is "unset" on both sides and never reaches the address lifter.
  private address(addr: Address, direction: Direction): Address {
    if (addr === UNSET_ADDRESS) {
      return UNSET_ADDRESS;
    }
    return direction === "lift" ? this.addresses.lift(addr) : this.addresses.lower(addr);
  }

  private type(name: string, direction: Direction): string {
    return direction === "lift" ? this.liftType(name) : this.lowerType(name);
  }

  private func(fn: FunctionArtifact, direction: Direction): FunctionArtifact {
    return {
      addr: this.address(fn.addr, direction),
      size: fn.size,
      header: this.header(fn.header, direction),
      stackVars: fn.stackVars.map((svar) => this.stackVariable(svar, direction)),
    };
  }

  private header(header: FunctionHeader, direction: Direction): FunctionHeader {
    const converted: FunctionHeader = {
      name: header.name,
      addr: this.address(header.addr, direction),
    };
    if (header.returnType !== undefined) {
      converted.returnType = this.type(header.returnType, direction);
    }
    return converted;
  }

  private stackVariable(svar: StackVariable, direction: Direction): StackVariable {
    return {
      funcAddr: this.address(svar.funcAddr, direction),
      offset: svar.offset,
      name: svar.name,
      type: this.type(svar.type, direction),
      size: svar.size,
    };
  }

  private globalVariable(gvar: GlobalVariable, direction: Direction): GlobalVariable {
    const converted: GlobalVariable = {
      addr: this.address(gvar.addr, direction),
      name: gvar.name,
      size: gvar.size,
    };
    if (gvar.type !== undefined) {
      converted.type = this.type(gvar.type, direction);
    }
    return converted;
  }

  private struct(struct: Struct, direction: Direction): Struct {
    return {
      name: struct.name,
      size: struct.size,
      members: struct.members.map((member) => ({
        offset: member.offset,
        name: member.name,
        type: this.type(member.type, direction),
        size: member.size,
      })),
    };
  }

  private comment(comment: Comment, direction: Direction): Comment {
    const converted: Comment = {
      addr: this.address(comment.addr, direction),
      text: comment.text,
      decompiled: comment.decompiled,
    };
    if (comment.funcAddr !== undefined) {
      converted.funcAddr = this.address(comment.funcAddr, direction);
    }
    return converted;
  }
}
