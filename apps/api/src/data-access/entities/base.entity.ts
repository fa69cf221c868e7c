export interface BaseEntity {
  id: number;
  createdAt: Date;
}
