// src/decoyProfiles.ts
import { DecoyProfile, Interest } from "./models";

// Shown to non-VIP users instead of real members. Never persisted.
export const DECOY_MALE: readonly DecoyProfile[] = [
  { name: "Rahul", age: 24, city: "Delhi", bio: "Coffee & coding.", photo: "https://picsum.photos/400?random=11" },
  { name: "Aman", age: 26, city: "Mumbai", bio: "Traveler.", photo: "https://picsum.photos/400?random=12" },
  { name: "Vishal", age: 23, city: "Kolkata", bio: "Food lover.", photo: "https://picsum.photos/400?random=13" },
];

export const DECOY_FEMALE: readonly DecoyProfile[] = [
  { name: "Priya", age: 22, city: "Delhi", bio: "Bookworm.", photo: "https://picsum.photos/400?random=21" },
  { name: "Anjali", age: 24, city: "Pune", bio: "Artist.", photo: "https://picsum.photos/400?random=22" },
  { name: "Sana", age: 23, city: "Bengaluru", bio: "Coffee lover.", photo: "https://picsum.photos/400?random=23" },
];

export function decoyPool(interest: Interest): readonly DecoyProfile[] {
  if (interest === "male") return DECOY_MALE;
  if (interest === "female") return DECOY_FEMALE;
  return [...DECOY_MALE, ...DECOY_FEMALE];
}
