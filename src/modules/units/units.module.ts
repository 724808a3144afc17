import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Unit } from './entities/unit.entity';
import { Project } from '../projects/entities/project.entity';
import { Owner } from '../owners/entities/owner.entity';
import { Contract } from '../contracts/entities/contract.entity';
import { UnitsService } from './units.service';
import { UnitsController } from './units.controller';
import { ActivityModule } from '../activity/activity.module';

@Module({
    imports: [TypeOrmModule.forFeature([Unit, Project, Owner, Contract]), ActivityModule],
    controllers: [UnitsController],
    providers: [UnitsService],
})
export class UnitsModule { }
